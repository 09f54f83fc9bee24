/**
 * cron_describe tool - Check and describe a schedule before using it.
 */

import { successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { scheduleField } from "./schemas.js";

interface CronDescribeInput {
  schedule: string;
}

export const registerCronDescribe: ToolRegistrar = (server, service) => {
  server.registerTool(
    "cron_describe",
    {
      title: "Describe schedule",
      description: "Validate a cron schedule and describe it in plain English. Nothing is installed.",
      inputSchema: {
        schedule: scheduleField,
      },
    },
    async (input: CronDescribeInput) => {
      const check = service.describe(input.schedule);
      const text = check.valid
        ? `${check.schedule}: ${check.description}`
        : `${check.schedule}: invalid (${check.error})`;
      return successResponse(text, { ...check });
    }
  );
};
