/**
 * ssh_disconnect tool - Close an embedded session.
 */

import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { sessionIdField } from "./schemas.js";

interface DisconnectInput {
  id: string;
}

export const registerDisconnect: ToolRegistrar = (server, { sessions }) => {
  server.registerTool(
    "ssh_disconnect",
    {
      title: "Disconnect",
      description: "Terminate an SSH session (SIGTERM to the ssh client).",
      inputSchema: {
        id: sessionIdField,
      },
    },
    async (input: DisconnectInput) => {
      const result = sessions.disconnect(input.id);
      if (!result.ok) {
        return errorResponse(result.error);
      }
      return successResponse(`SSH connection terminated: ${result.value.target}`, { session: result.value });
    }
  );
};
