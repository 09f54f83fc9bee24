/**
 * ssh_connect and ssh_quick_connect tools - Start an embedded session.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@termdesk/core";
import type { Result, SshTarget } from "../core/model.js";
import type { Services, ToolRegistrar } from "./types.js";
import { hostField, portField, userField } from "./schemas.js";

interface ConnectInput {
  connection: string;
}

interface QuickConnectInput {
  host: string;
  user: string;
  port?: number;
}

async function startSession(sessions: Services["sessions"], target: Result<SshTarget, string>) {
  if (!target.ok) {
    return errorResponse(target.error);
  }

  const result = await sessions.connect(target.value);
  if (!result.ok) {
    return errorResponse(result.error);
  }

  const session = result.value;
  return successResponse(
    `SSH session ${session.id} to ${session.target}: ${session.status}\nUse ssh_send to run commands and ssh_read to see output.`,
    { session }
  );
}

const SESSION_NOTE = `The session runs over pipes, so only key or agent authentication works;
use ssh_open_terminal for password logins.`;

export const registerConnect: ToolRegistrar = (server, { ssh, sessions }) => {
  server.registerTool(
    "ssh_connect",
    {
      title: "Connect",
      description: `Start an embedded SSH session to a saved connection and return its session id.
${SESSION_NOTE}`,
      inputSchema: {
        connection: z.string().min(1).describe("Saved connection id or name"),
      },
    },
    async (input: ConnectInput) => startSession(sessions, ssh.resolveTarget({ connection: input.connection }))
  );
};

export const registerQuickConnect: ToolRegistrar = (server, { ssh, sessions }) => {
  server.registerTool(
    "ssh_quick_connect",
    {
      title: "Quick connect",
      description: `Start an embedded SSH session to host and user without saving a connection.
${SESSION_NOTE}`,
      inputSchema: {
        host: hostField,
        user: userField,
        port: portField,
      },
    },
    async (input: QuickConnectInput) => startSession(sessions, ssh.resolveTarget(input))
  );
};
