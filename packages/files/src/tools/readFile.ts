/**
 * read_file tool - Load a text file for viewing or editing.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";

interface ReadFileInput {
  path: string;
}

export const registerReadFile: ToolRegistrar = (server, service) => {
  server.registerTool(
    "read_file",
    {
      title: "Read file",
      description: "Read a UTF-8 text file. The file is added to the recent files list.",
      inputSchema: {
        path: z.string().min(1).describe("File path (~ is expanded)"),
      },
    },
    async (input: ReadFileInput) => {
      const result = await service.readFile(input.path);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const file = result.value;
      const header = `# ${file.path} (${file.lines} lines, ${file.size} bytes)`;
      return successResponse(`${header}\n\n${file.content}`, { ...file });
    }
  );
};
