/**
 * ssh_list_connections tool - Saved SSH connections.
 */

import { successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { formatConnection } from "./format.js";

export const registerListConnections: ToolRegistrar = (server, { ssh }) => {
  server.registerTool(
    "ssh_list_connections",
    {
      title: "Saved connections",
      description: "List saved SSH connections. Use the id or name with ssh_connect, ssh_open_terminal or ssh_test_connection.",
      inputSchema: {},
    },
    async () => {
      const connections = ssh.listConnections();
      const text =
        connections.length === 0 ? "No saved connections" : connections.map(formatConnection).join("\n");
      return successResponse(text, { connections });
    }
  );
};
