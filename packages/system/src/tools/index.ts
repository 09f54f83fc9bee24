/**
 * MCP tool registration for the system package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Services, ToolRegistrar } from "./types.js";

import { registerProcessList } from "./processList.js";
import { registerProcessKill } from "./processKill.js";
import { registerSystemInfo } from "./systemInfo.js";
import { registerSystemLogs } from "./systemLogs.js";
import { registerShellCwd, registerShellHistory, registerShellRun } from "./shell.js";

const allTools: ToolRegistrar[] = [
  registerProcessList,
  registerProcessKill,
  registerSystemInfo,
  registerSystemLogs,
  registerShellRun,
  registerShellCwd,
  registerShellHistory,
];

export function registerAllTools(server: McpServer, services: Services): void {
  for (const register of allTools) {
    register(server, services);
  }
}

export type { Services, ToolRegistrar } from "./types.js";
