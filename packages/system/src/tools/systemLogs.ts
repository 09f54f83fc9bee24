/**
 * system_logs tool - Recent system log entries.
 */

import { resultToResponse } from "@termdesk/core";
import * as z from "zod/v4";
import type { ToolRegistrar } from "./types.js";

export const registerSystemLogs: ToolRegistrar = (server, { system }) => {
  server.registerTool(
    "system_logs",
    {
      title: "System logs",
      description: `Show the end of the first readable system log (/var/log/syslog, /var/log/messages,
/var/log/kern.log, /var/log/dmesg), then journalctl. On Windows, the System event log.`,
      inputSchema: {
        search: z.string().optional().describe("Only show lines containing this text (case-insensitive)"),
      },
    },
    async (input) =>
      resultToResponse(await system.systemLogs(input.search), (logs) => ({
        text: `System logs - ${logs.source}${logs.search ? ` (matching "${logs.search}")` : ""}\n\n${logs.text}`,
        data: { ...logs },
      }))
  );
};
