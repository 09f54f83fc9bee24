/**
 * Target validation and ssh client argument lists.
 */

import { existsSync } from "node:fs";
import { expandHome } from "@termdesk/core";

import { Err, Ok, type Result, type SshMode, type SshTarget, type TargetInput } from "./model.js";

export const DEFAULT_SSH_PORT = 22;
export const CONNECT_TIMEOUT_SECONDS = 10;
export const TEST_COMMAND = ["echo", "Connection test successful"];

export function validateTarget(input: TargetInput): Result<SshTarget, string> {
  const host = input.host.trim();
  const user = input.user.trim();
  const port = input.port ?? DEFAULT_SSH_PORT;
  const keyFile = input.keyFile?.trim();

  if (!host) return Err("Host is required");
  if (!user) return Err("User is required");
  if (/\s/.test(host) || host.startsWith("-")) return Err(`Invalid host: ${host}`);
  if (/[\s@]/.test(user) || user.startsWith("-")) return Err(`Invalid user: ${user}`);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return Err("Port must be an integer between 1 and 65535");
  }

  return Ok({ host, user, port, ...(keyFile ? { keyFile: expandHome(keyFile) } : {}) });
}

export function targetLabel(target: SshTarget): string {
  return `${target.user}@${target.host}:${target.port}`;
}

/**
 * Arguments for the `ssh` binary.
 * The key is only passed when the file exists; ssh would refuse to start otherwise.
 *
 * @example
 * buildSshArgs({ host: "db1", user: "ops", port: 2222 }, "interactive")
 * // => ["-p", "2222", "-o", "ConnectTimeout=10", "-t", "ops@db1"]
 */
export function buildSshArgs(
  target: SshTarget,
  mode: SshMode,
  keyExists: (path: string) => boolean = existsSync
): string[] {
  const args: string[] = [];

  if (target.keyFile && keyExists(target.keyFile)) {
    args.push("-i", target.keyFile);
  }
  if (target.port !== DEFAULT_SSH_PORT) {
    args.push("-p", String(target.port));
  }
  args.push("-o", `ConnectTimeout=${CONNECT_TIMEOUT_SECONDS}`);

  switch (mode) {
    case "interactive":
      args.push("-t");
      break;
    case "session":
      // Password prompts cannot be answered over pipes
      args.push("-T", "-o", "BatchMode=yes");
      break;
    case "test":
      args.push("-o", "BatchMode=yes");
      break;
  }

  args.push(`${target.user}@${target.host}`);
  if (mode === "test") args.push(...TEST_COMMAND);
  return args;
}
