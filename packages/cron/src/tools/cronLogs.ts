/**
 * cron_logs tool - Recent cron activity.
 */

import { errorResponse, successResponse } from "@termdesk/core";
import * as z from "zod/v4";
import type { ToolRegistrar } from "./types.js";

export const registerCronLogs: ToolRegistrar = (server, service) => {
  server.registerTool(
    "cron_logs",
    {
      title: "Cron logs",
      description: `Show recent cron log entries from /var/log/cron, /var/log/cron.log or /var/log/syslog,
falling back to journalctl -u cron. Reading system logs may need elevated permissions.`,
      inputSchema: {
        search: z.string().optional().describe("Only show lines containing this text (case-insensitive)"),
      },
    },
    async (input) => {
      const result = await service.viewLogs(input.search);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const logs = result.value;
      const heading = logs.filtered ? `Cron logs - ${logs.source}` : `System logs - ${logs.source}`;
      const matching = logs.search ? ` (matching "${logs.search}")` : "";
      return successResponse(`${heading}${matching}\n\n${logs.text}`, { ...logs });
    }
  );
};
