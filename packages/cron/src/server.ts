#!/usr/bin/env node
/**
 * MCP server for cron job management.
 */

import { NodeCommandRunner, runServer } from "@termdesk/core";
import { CronService } from "./core/services/CronService.js";
import { CrontabCli } from "./infrastructure/cli/CrontabCli.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "termdesk:cron",
    version: "0.1.0",
  },
  createServices: () => {
    const runner = new NodeCommandRunner();
    return { cron: new CronService(new CrontabCli(runner), runner) };
  },
  registerTools: registerAllTools,
  onStartup: async ({ cron }) => {
    const available = await cron.checkAvailable();
    if (!available.ok) {
      console.error(`[cron] crontab is not usable, cron tools will report errors: ${available.error}`);
    }
  },
});
