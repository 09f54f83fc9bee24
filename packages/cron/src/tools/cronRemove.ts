/**
 * cron_remove tool - Delete a cron job.
 */

import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { indexField } from "./schemas.js";

interface CronRemoveInput {
  index: number;
}

export const registerCronRemove: ToolRegistrar = (server, service) => {
  server.registerTool(
    "cron_remove",
    {
      title: "Delete cron job",
      description: "Remove one job from the crontab. Removing the only remaining job removes the crontab.",
      inputSchema: {
        index: indexField,
      },
    },
    async (input: CronRemoveInput) => {
      const result = await service.remove(input.index);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const job = result.value;
      return successResponse(`Deleted cron job: ${job.schedule} ${job.command}`, { job });
    }
  );
};
