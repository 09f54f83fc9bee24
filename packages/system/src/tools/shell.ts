/**
 * shell_run, shell_cwd and shell_history tools.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse, textResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";

interface ShellRunInput {
  command: string;
}

export const registerShellRun: ToolRegistrar = (server, { shell }) => {
  server.registerTool(
    "shell_run",
    {
      title: "Run command",
      description: `Run one command line in the current working directory and return its output.
cd, pwd and clear (clears the history) are handled here. Commands time out after 60 seconds.`,
      inputSchema: {
        command: z.string().describe("Command line to run"),
      },
    },
    async (input: ShellRunInput) => {
      const result = await shell.run(input.command);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const run = result.value;
      return successResponse(`${run.cwd}$ ${run.command}\n${run.output}`, { ...run });
    }
  );
};

export const registerShellCwd: ToolRegistrar = (server, { shell }) => {
  server.registerTool(
    "shell_cwd",
    {
      title: "Working directory",
      description: "Show the shell's current working directory.",
      inputSchema: {},
    },
    async () => textResponse(shell.cwd())
  );
};

export const registerShellHistory: ToolRegistrar = (server, { shell }) => {
  server.registerTool(
    "shell_history",
    {
      title: "Shell history",
      description: "Commands run so far, oldest first, without duplicates.",
      inputSchema: {},
    },
    async () => {
      const history = shell.history();
      const text = history.length === 0 ? "No commands run" : history.map((c, i) => `${i + 1}  ${c}`).join("\n");
      return successResponse(text, { history });
    }
  );
};
