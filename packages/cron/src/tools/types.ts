/**
 * Shared types for cron tool registration.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CronService } from "../core/services/CronService.js";

export interface ToolRegistrar {
  (server: McpServer, service: CronService): void;
}
