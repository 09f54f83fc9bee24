/**
 * write_file tool - Save text to a file.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";

interface WriteFileInput {
  path: string;
  content: string;
}

export const registerWriteFile: ToolRegistrar = (server, service) => {
  server.registerTool(
    "write_file",
    {
      title: "Save file",
      description: "Write text to a file, replacing its content. The parent directory must already exist.",
      inputSchema: {
        path: z.string().min(1).describe("File path (~ is expanded)"),
        content: z.string().describe("Full file content"),
      },
    },
    async (input: WriteFileInput) => {
      const result = await service.writeFile(input.path, input.content);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const written = result.value;
      const verb = written.created ? "Created" : "Saved";
      return successResponse(`${verb}: ${written.path} (${written.bytes} bytes)`, { ...written });
    }
  );
};
