#!/usr/bin/env node
/**
 * MCP server for processes, system information and a one-shot shell.
 */

import { NodeCommandRunner, detectPlatform, runServer } from "@termdesk/core";
import { ProcessService } from "./core/services/ProcessService.js";
import { ShellService } from "./core/services/ShellService.js";
import { SystemService } from "./core/services/SystemService.js";
import type { ProcessSignaller } from "./core/ports/index.js";
import { NodeProcessSignaller } from "./infrastructure/os/NodeProcessSignaller.js";
import { PsProcessTable } from "./infrastructure/os/PsProcessTable.js";
import { TaskkillSignaller } from "./infrastructure/os/TaskkillSignaller.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "termdesk:system",
    version: "0.1.0",
  },
  createServices: () => {
    const runner = new NodeCommandRunner();
    const platform = detectPlatform();
    const signaller: ProcessSignaller =
      platform === "win32" ? new TaskkillSignaller(runner) : new NodeProcessSignaller();

    return {
      processes: new ProcessService(new PsProcessTable(runner, platform), signaller),
      system: new SystemService(runner, platform),
      shell: new ShellService(runner),
    };
  },
  registerTools: registerAllTools,
});
