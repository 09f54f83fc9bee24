/**
 * system_info tool - Host overview.
 */

import { successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { formatSystemInfo } from "./format.js";

export const registerSystemInfo: ToolRegistrar = (server, { system }) => {
  server.registerTool(
    "system_info",
    {
      title: "System info",
      description: "Hostname, OS, uptime, load, memory, disk usage and network addresses.",
      inputSchema: {},
    },
    async () => {
      const info = await system.systemInfo();
      return successResponse(formatSystemInfo(info), { ...info });
    }
  );
};
