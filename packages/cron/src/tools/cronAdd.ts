/**
 * cron_add tool - Schedule a new cron job.
 */

import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { commandField, scheduleField } from "./schemas.js";
import { formatEntry } from "./format.js";

interface CronAddInput {
  schedule: string;
  command: string;
}

export const registerCronAdd: ToolRegistrar = (server, service) => {
  server.registerTool(
    "cron_add",
    {
      title: "Add cron job",
      description: `Add a job to the current user's crontab.

The schedule is checked field by field before anything is installed:
minute 0-59, hour 0-23, day 1-31, month 1-12, weekday 0-6 (0=Sunday).
Each field takes *, */N, a number, a-b, or a comma list. See cron_presets for common schedules.`,
      inputSchema: {
        schedule: scheduleField,
        command: commandField,
      },
    },
    async (input: CronAddInput) => {
      const result = await service.add(input.schedule, input.command);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      return successResponse(`Added cron job:\n${formatEntry(result.value)}`, { job: result.value });
    }
  );
};
