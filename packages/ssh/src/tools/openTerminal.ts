/**
 * ssh_open_terminal tool - Interactive SSH in a new terminal window.
 */

import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { targetFields, toTargetRef, type TargetFieldsInput } from "./schemas.js";

export const registerOpenTerminal: ToolRegistrar = (server, { ssh }) => {
  server.registerTool(
    "ssh_open_terminal",
    {
      title: "Open SSH terminal",
      description: `Open an interactive SSH session in a new terminal window, for password logins
and full-screen programs. Tries TERMDESK_TERMINAL, then gnome-terminal, xterm, konsole,
lxterminal and xfce4-terminal (Terminal.app on macOS, cmd on Windows).`,
      inputSchema: targetFields,
    },
    async (input: TargetFieldsInput) => {
      const target = ssh.resolveTarget(toTargetRef(input));
      if (!target.ok) {
        return errorResponse(target.error);
      }

      const result = await ssh.openTerminal(target.value);
      if (!result.ok) {
        return errorResponse(result.error);
      }
      return successResponse(`SSH session to ${result.value.target} opened in ${result.value.launcher}`, {
        ...result.value,
      });
    }
  );
};
