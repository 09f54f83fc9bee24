#!/usr/bin/env node
/**
 * MCP server for SSH connections and embedded sessions.
 */

import { JsonSettingsStore, NodeCommandRunner, detectPlatform, runServer } from "@termdesk/core";
import { SshService } from "./core/services/SshService.js";
import { SshSessionManager } from "./core/services/SshSessionManager.js";
import { NodeSessionSpawner } from "./infrastructure/runner/NodeSessionSpawner.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "termdesk:ssh",
    version: "0.1.0",
  },
  createServices: () => ({
    ssh: new SshService(new NodeCommandRunner(), new JsonSettingsStore(), {
      platform: detectPlatform(),
      terminal: process.env.TERMDESK_TERMINAL,
    }),
    sessions: new SshSessionManager(new NodeSessionSpawner()),
  }),
  registerTools: registerAllTools,
  onShutdown: ({ sessions }) => {
    const stopped = sessions.stopAll();
    if (stopped > 0) {
      console.error(`[ssh] Stopped ${stopped} open session(s)`);
    }
  },
});
