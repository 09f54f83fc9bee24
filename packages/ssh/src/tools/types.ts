/**
 * Shared types for ssh tool registration.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SshService } from "../core/services/SshService.js";
import type { SshSessionManager } from "../core/services/SshSessionManager.js";

export interface Services {
  ssh: SshService;
  sessions: SshSessionManager;
}

export interface ToolRegistrar {
  (server: McpServer, services: Services): void;
}
