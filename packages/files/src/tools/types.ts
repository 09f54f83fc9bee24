/**
 * Shared types for files tool registration.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { FileService } from "../core/FileService.js";

export interface ToolRegistrar {
  (server: McpServer, service: FileService): void;
}

export type { ToolResponse } from "@termdesk/core";
