/**
 * cron_explain tool - Field-by-field breakdown of a job's schedule.
 */

import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { indexField } from "./schemas.js";

interface CronExplainInput {
  index: number;
}

export const registerCronExplain: ToolRegistrar = (server, service) => {
  server.registerTool(
    "cron_explain",
    {
      title: "Explain cron job",
      description: "Show a job's schedule field by field, with each field's allowed range and meaning.",
      inputSchema: {
        index: indexField,
      },
    },
    async (input: CronExplainInput) => {
      const result = await service.explain(input.index);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const { entry, fields } = result.value;
      const lines = [
        `Schedule: ${entry.schedule}`,
        `Command:  ${entry.command}`,
        `Runs:     ${entry.description}`,
        "",
        ...fields.map((f) => `${f.field.padEnd(8)} ${f.value.padEnd(10)} (${f.range})  ${f.meaning}`),
      ];
      return successResponse(lines.join("\n"), { entry, fields });
    }
  );
};
