/**
 * MCP tool registration for the ssh package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Services, ToolRegistrar } from "./types.js";

import { registerListConnections } from "./listConnections.js";
import { registerSaveConnection } from "./saveConnection.js";
import { registerRemoveConnection } from "./removeConnection.js";
import { registerTestConnection } from "./testConnection.js";
import { registerOpenTerminal } from "./openTerminal.js";
import { registerConnect, registerQuickConnect } from "./connect.js";
import { registerSend } from "./send.js";
import { registerRead } from "./read.js";
import { registerClearOutput } from "./clearOutput.js";
import { registerDisconnect } from "./disconnect.js";
import { registerSessions } from "./sessions.js";

const allTools: ToolRegistrar[] = [
  registerListConnections,
  registerSaveConnection,
  registerRemoveConnection,
  registerTestConnection,
  registerOpenTerminal,
  registerConnect,
  registerQuickConnect,
  registerSend,
  registerRead,
  registerClearOutput,
  registerDisconnect,
  registerSessions,
];

export function registerAllTools(server: McpServer, services: Services): void {
  for (const register of allTools) {
    register(server, services);
  }
}

export type { Services, ToolRegistrar } from "./types.js";
