/**
 * cron_list tool - Show the current user's cron jobs.
 */

import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { formatEntry } from "./format.js";

export const registerCronList: ToolRegistrar = (server, service) => {
  server.registerTool(
    "cron_list",
    {
      title: "List cron jobs",
      description: `List the current user's cron jobs with a plain-English description of each schedule.
Indexes shown here are what cron_update, cron_remove and cron_explain take.`,
      inputSchema: {},
    },
    async () => {
      const result = await service.list();
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const jobs = result.value;
      const text = jobs.length === 0 ? "No cron jobs" : jobs.map(formatEntry).join("\n");
      return successResponse(text, { jobs, count: jobs.length });
    }
  );
};
