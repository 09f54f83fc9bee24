/**
 * MCP tool registration for the cron package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CronService } from "../core/services/CronService.js";
import type { ToolRegistrar } from "./types.js";

import { registerCronList } from "./cronList.js";
import { registerCronAdd } from "./cronAdd.js";
import { registerCronUpdate } from "./cronUpdate.js";
import { registerCronRemove } from "./cronRemove.js";
import { registerCronExplain } from "./cronExplain.js";
import { registerCronDescribe } from "./cronDescribe.js";
import { registerCronPresets } from "./cronPresets.js";
import { registerCronLogs } from "./cronLogs.js";

export interface Services {
  cron: CronService;
}

const allTools: ToolRegistrar[] = [
  registerCronList,
  registerCronAdd,
  registerCronUpdate,
  registerCronRemove,
  registerCronExplain,
  registerCronDescribe,
  registerCronPresets,
  registerCronLogs,
];

export function registerAllTools(server: McpServer, services: Services): void {
  for (const register of allTools) {
    register(server, services.cron);
  }
}

export type { ToolRegistrar } from "./types.js";
