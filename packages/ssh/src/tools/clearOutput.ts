/**
 * ssh_clear_output tool - Empty a session's output buffer.
 */

import { resultToResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { sessionIdField } from "./schemas.js";

interface ClearOutputInput {
  id: string;
}

export const registerClearOutput: ToolRegistrar = (server, { sessions }) => {
  server.registerTool(
    "ssh_clear_output",
    {
      title: "Clear output",
      description: "Discard the buffered output of an SSH session. The command history is kept.",
      inputSchema: {
        id: sessionIdField,
      },
    },
    async (input: ClearOutputInput) =>
      resultToResponse(sessions.clearOutput(input.id), (session) => ({
        text: `Output cleared: ${session.id}`,
        data: { session },
      }))
  );
};
