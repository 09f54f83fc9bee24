/**
 * ssh_send tool - Run a command in an embedded session.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { sessionIdField } from "./schemas.js";

interface SendInput {
  id: string;
  command: string;
}

export const registerSend: ToolRegistrar = (server, { sessions }) => {
  server.registerTool(
    "ssh_send",
    {
      title: "Send command",
      description: "Send a command line to an open SSH session. Output arrives asynchronously; read it with ssh_read.",
      inputSchema: {
        id: sessionIdField,
        command: z.string().min(1).describe("Command line to send"),
      },
    },
    async (input: SendInput) => {
      const result = sessions.send(input.id, input.command);
      if (!result.ok) {
        return errorResponse(result.error);
      }
      return successResponse(`Sent to ${result.value.target}: ${input.command.trim()}`, { session: result.value });
    }
  );
};
