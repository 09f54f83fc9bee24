/**
 * ssh_save_connection tool - Add or edit a saved connection.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { hostField, keyFileField, portField, userField } from "./schemas.js";
import { formatConnection } from "./format.js";

interface SaveConnectionInput {
  id?: string;
  name: string;
  host: string;
  user: string;
  port?: number;
  keyFile?: string;
}

export const registerSaveConnection: ToolRegistrar = (server, { ssh }) => {
  server.registerTool(
    "ssh_save_connection",
    {
      title: "Save connection",
      description: `Save an SSH connection (name, host, user, port, optional key file).
Pass id to edit an existing connection. Passwords are never stored.`,
      inputSchema: {
        id: z.string().optional().describe("Id of the connection to edit"),
        name: z.string().min(1).describe("Display name"),
        host: hostField,
        user: userField,
        port: portField,
        keyFile: keyFileField,
      },
    },
    async (input: SaveConnectionInput) => {
      const result = ssh.saveConnection(input);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const { connection, created, warning } = result.value;
      const lines = [`${created ? "Saved" : "Updated"} connection: ${formatConnection(connection)}`];
      if (warning) lines.push(`Warning: ${warning}`);
      return successResponse(lines.join("\n"), { ...result.value });
    }
  );
};
