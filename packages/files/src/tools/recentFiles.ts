/**
 * recent_files tool - List or prune recently used files.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";

interface RecentFilesInput {
  forget?: string;
}

export const registerRecentFiles: ToolRegistrar = (server, service) => {
  server.registerTool(
    "recent_files",
    {
      title: "Recent files",
      description: `List the last files opened, read or saved (up to 10, newest first).
Files that no longer exist are hidden. Pass forget=<path> to drop one entry first.`,
      inputSchema: {
        forget: z.string().optional().describe("Path to remove from the list"),
      },
    },
    async (input: RecentFilesInput) => {
      if (input.forget) {
        const removed = service.forgetRecent(input.forget);
        if (!removed.ok) {
          return errorResponse(removed.error);
        }
      }

      const files = service.listRecent();
      const text =
        files.length === 0
          ? "No recent files"
          : files.map((f, i) => `${i + 1}. ${f.name}  (${f.path})`).join("\n");

      return successResponse(text, { files });
    }
  );
};
