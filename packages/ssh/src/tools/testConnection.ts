/**
 * ssh_test_connection tool - Check that a login works without opening a session.
 */

import { errorResponse, successResponse } from "@termdesk/core";
import type { ToolRegistrar } from "./types.js";
import { targetFields, toTargetRef, type TargetFieldsInput } from "./schemas.js";

export const registerTestConnection: ToolRegistrar = (server, { ssh }) => {
  server.registerTool(
    "ssh_test_connection",
    {
      title: "Test connection",
      description: `Try a non-interactive login (key or agent authentication only) and run a single echo.
Gives up after 15 seconds. Failures carry ssh's own error output: host unreachable,
wrong credentials, firewall or key problems.`,
      inputSchema: targetFields,
    },
    async (input: TargetFieldsInput) => {
      const target = ssh.resolveTarget(toTargetRef(input));
      if (!target.ok) {
        return errorResponse(target.error);
      }

      const result = await ssh.testConnection(target.value);
      if (!result.ok) {
        return errorResponse(result.error);
      }
      return successResponse(`SSH connection test successful: ${result.value.target}`, { ...result.value });
    }
  );
};
