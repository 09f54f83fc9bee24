/**
 * ssh_read tool - Buffered output of a session.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { sessionIdField } from "./schemas.js";

interface ReadInput {
  id: string;
  lastLines?: number;
}

export const registerRead: ToolRegistrar = (server, { sessions }) => {
  server.registerTool(
    "ssh_read",
    {
      title: "Read output",
      description: "Show the latest output of an SSH session (ANSI codes removed). Ended sessions can still be read.",
      inputSchema: {
        id: sessionIdField,
        lastLines: z.number().int().min(1).max(500).optional().describe("Lines to return (default: 50)"),
      },
    },
    async (input: ReadInput) => {
      const result = sessions.read(input.id, input.lastLines ?? 50);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const output = result.value;
      const header = `# ${output.id} (${output.status}, ${output.lines.length} of ${output.total} lines)`;
      return successResponse(`${header}\n${output.lines.join("\n")}`, { ...output });
    }
  );
};
