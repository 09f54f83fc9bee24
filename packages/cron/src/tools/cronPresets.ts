/**
 * cron_presets tool - Common schedules to pick from.
 */

import { successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";

export const registerCronPresets: ToolRegistrar = (server, service) => {
  server.registerTool(
    "cron_presets",
    {
      title: "Schedule presets",
      description: "List ready-made schedules (every 5 minutes, daily at midnight, weekly, ...) for cron_add.",
      inputSchema: {},
    },
    async () => {
      const presets = [...service.presets()];
      const text = presets.map((p) => `${p.schedule.padEnd(14)} ${p.label}`).join("\n");
      return successResponse(text, { presets });
    }
  );
};
