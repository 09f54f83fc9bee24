/**
 * open_path tool - Open a file or folder with its default application.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";

interface OpenPathInput {
  path: string;
}

export const registerOpenPath: ToolRegistrar = (server, service) => {
  server.registerTool(
    "open_path",
    {
      title: "Open file or folder",
      description: `Open a file or folder with the application the OS associates with it
(xdg-open on Linux, open on macOS, start on Windows). Folders open in the file manager.`,
      inputSchema: {
        path: z.string().min(1).describe("File or folder path (~ is expanded)"),
      },
    },
    async (input: OpenPathInput) => {
      const result = await service.openPath(input.path);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const opened = result.value;
      return successResponse(`Opened ${opened.kind}: ${opened.path}`, {
        path: opened.path,
        kind: opened.kind,
        opener: opened.opener,
      });
    }
  );
};
