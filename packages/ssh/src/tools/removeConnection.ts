/**
 * ssh_remove_connection tool - Delete a saved connection.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";

interface RemoveConnectionInput {
  connection: string;
}

export const registerRemoveConnection: ToolRegistrar = (server, { ssh }) => {
  server.registerTool(
    "ssh_remove_connection",
    {
      title: "Delete connection",
      description: "Delete a saved SSH connection by id or name.",
      inputSchema: {
        connection: z.string().min(1).describe("Connection id or name"),
      },
    },
    async (input: RemoveConnectionInput) => {
      const result = ssh.removeConnection(input.connection);
      if (!result.ok) {
        return errorResponse(result.error);
      }
      return successResponse(`Deleted connection: ${result.value.name}`, { connection: result.value });
    }
  );
};
