#!/usr/bin/env node
/**
 * MCP server for file and folder operations.
 */

import { JsonSettingsStore, NodeCommandRunner, detectPlatform, runServer } from "@termdesk/core";
import { FileService } from "./core/FileService.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "termdesk:files",
    version: "0.1.0",
  },
  createServices: () => ({
    files: new FileService(new NodeCommandRunner(), new JsonSettingsStore(), {
      platform: detectPlatform(),
      terminal: process.env.TERMDESK_TERMINAL,
    }),
  }),
  registerTools: registerAllTools,
});
