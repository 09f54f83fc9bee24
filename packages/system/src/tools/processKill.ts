/**
 * process_kill tool - Terminate one process.
 */

import * as z from "zod/v4";
import { resultToResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";

interface ProcessKillInput {
  pid: number;
  force?: boolean;
}

export const registerProcessKill: ToolRegistrar = (server, { processes }) => {
  server.registerTool(
    "process_kill",
    {
      title: "Kill process",
      description: "Send SIGTERM to a process, or SIGKILL with force=true. On Windows this runs taskkill.",
      inputSchema: {
        pid: z.number().int().describe("Process id"),
        force: z.boolean().optional().describe("Kill immediately instead of asking the process to exit"),
      },
    },
    async (input: ProcessKillInput) =>
      resultToResponse(await processes.kill(input.pid, { force: input.force }), (outcome) => ({
        text: `Sent ${outcome.signal} to process ${outcome.pid}`,
        data: { ...outcome },
      }))
  );
};
