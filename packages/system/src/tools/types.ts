/**
 * Shared types for system tool registration.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ProcessService } from "../core/services/ProcessService.js";
import type { ShellService } from "../core/services/ShellService.js";
import type { SystemService } from "../core/services/SystemService.js";

export interface Services {
  processes: ProcessService;
  system: SystemService;
  shell: ShellService;
}

export interface ToolRegistrar {
  (server: McpServer, services: Services): void;
}
