/**
 * cron_update tool - Change a job's schedule and command.
 */

import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { commandField, indexField, scheduleField } from "./schemas.js";
import { formatEntry } from "./format.js";

interface CronUpdateInput {
  index: number;
  schedule: string;
  command: string;
}

export const registerCronUpdate: ToolRegistrar = (server, service) => {
  server.registerTool(
    "cron_update",
    {
      title: "Edit cron job",
      description: "Replace the schedule and command of an existing job. Comments and other lines are kept as they are.",
      inputSchema: {
        index: indexField,
        schedule: scheduleField,
        command: commandField,
      },
    },
    async (input: CronUpdateInput) => {
      const result = await service.update(input.index, input.schedule, input.command);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      return successResponse(`Updated cron job:\n${formatEntry(result.value)}`, { job: result.value });
    }
  );
};
