/**
 * open_in_editor tool - Edit a file with a terminal editor in a new window.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";

interface OpenInEditorInput {
  path: string;
  editor?: string;
}

export const registerOpenInEditor: ToolRegistrar = (server, service) => {
  server.registerTool(
    "open_in_editor",
    {
      title: "Open in terminal editor",
      description: `Open a file in a terminal editor (nano, vim, emacs, micro...) inside a new terminal window.

Without editor, the preferred editor is used (default: nano).
Passing editor remembers it as the new preference.`,
      inputSchema: {
        path: z.string().min(1).describe("File path (~ is expanded)"),
        editor: z.string().optional().describe("Editor command, e.g. vim"),
      },
    },
    async (input: OpenInEditorInput) => {
      const result = await service.openInEditor(input.path, input.editor);
      if (!result.ok) {
        return errorResponse(result.error);
      }

      const launch = result.value;
      return successResponse(`Opened ${launch.path} in ${launch.editor} (via ${launch.launcher})`, { ...launch });
    }
  );
};
