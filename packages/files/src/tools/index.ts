/**
 * MCP tool registration for the files package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { FileService } from "../core/FileService.js";
import type { ToolRegistrar } from "./types.js";

import { registerOpenPath } from "./openPath.js";
import { registerReadFile } from "./readFile.js";
import { registerWriteFile } from "./writeFile.js";
import { registerRecentFiles } from "./recentFiles.js";
import { registerOpenInEditor } from "./openInEditor.js";

export interface Services {
  files: FileService;
}

const allTools: ToolRegistrar[] = [
  registerOpenPath,
  registerReadFile,
  registerWriteFile,
  registerRecentFiles,
  registerOpenInEditor,
];

export function registerAllTools(server: McpServer, services: Services): void {
  for (const register of allTools) {
    register(server, services.files);
  }
}

export type { ToolRegistrar } from "./types.js";
