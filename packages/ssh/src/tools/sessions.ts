/**
 * ssh_sessions tool - Open sessions, or one session's command history.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { formatSession } from "./format.js";

interface SessionsInput {
  history?: string;
}

export const registerSessions: ToolRegistrar = (server, { sessions }) => {
  server.registerTool(
    "ssh_sessions",
    {
      title: "Sessions",
      description: "List open SSH sessions. Pass history=<session id> for the commands sent to that session.",
      inputSchema: {
        history: z.string().optional().describe("Session id whose command history to show"),
      },
    },
    async (input: SessionsInput) => {
      if (input.history) {
        const history = sessions.history(input.history);
        if (!history.ok) {
          return errorResponse(history.error);
        }
        const text = history.value.length === 0 ? "No commands sent" : history.value.join("\n");
        return successResponse(text, { id: input.history, history: history.value });
      }

      const open = sessions.list();
      const text = open.length === 0 ? "No open SSH sessions" : open.map(formatSession).join("\n");
      return successResponse(text, { sessions: open });
    }
  );
};
