/**
 * process_list tool - Running processes.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { formatProcessTable } from "./format.js";

interface ProcessListInput {
  filter?: string;
  user?: string;
  limit?: number;
}

export const registerProcessList: ToolRegistrar = (server, { processes }) => {
  server.registerTool(
    "process_list",
    {
      title: "Processes",
      description: "List running processes (ps aux, or tasklist on Windows), optionally filtered by name or owner.",
      inputSchema: {
        filter: z.string().optional().describe("Case-insensitive text to look for in the name or command"),
        user: z.string().optional().describe("Only processes owned by this user"),
        limit: z.number().int().min(1).max(1000).optional().describe("Maximum rows (default: 100)"),
      },
    },
    async (input: ProcessListInput) => {
      const result = await processes.list(input);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const rows = result.value;
      const text = rows.length === 0 ? "No matching processes" : formatProcessTable(rows);
      return successResponse(text, { processes: rows });
    }
  );
};
