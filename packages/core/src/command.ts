/**
 * External command execution.
 * Spawns OS tools with a timeout and collects their output; a non-zero exit
 * is reported in the output, not as an error.
 */

import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

import { Err, Ok, errorMessage, type Result } from "./result.js";

export interface CommandOutput {
  stdout: string;
  stderr: string;
  /** null when the process was ended by a signal */
  exitCode: number | null;
}

export interface CommandError {
  kind: "not_found" | "timeout" | "spawn";
  message: string;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Written to stdin, which is then closed */
  input?: string;
  /** Run through the platform shell (command is a full command line) */
  shell?: boolean;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<Result<CommandOutput, CommandError>>;

  /** Start a detached program and resolve once it has spawned. */
  launch(command: string, args: string[], options?: { cwd?: string }): Promise<Result<number | undefined, CommandError>>;
}

export const DEFAULT_TIMEOUT_MS = 30000;

function spawnError(command: string, error: NodeJS.ErrnoException): CommandError {
  if (error.code === "ENOENT") {
    return { kind: "not_found", message: `Command not found: ${command}` };
  }
  return { kind: "spawn", message: `Failed to spawn ${command}: ${error.message}` };
}

/**
 * Deliver a stream as UTF-8 text. The decoder holds back a multibyte
 * character split across chunks until the rest of it arrives.
 */
export function readText(stream: Readable | null, onText: (text: string) => void): void {
  if (!stream) return;
  stream.setEncoding("utf8");
  stream.on("data", (text: string) => onText(text));
}

export interface KillableProcess {
  pid?: number;
  kill(signal?: NodeJS.Signals): boolean;
}

type GroupKill = (pid: number, signal: NodeJS.Signals) => void;

/**
 * Signal a process, or with `group` its whole process group, so the
 * children of a shell pipeline end with it. Falls back to the single
 * process when the group cannot be signalled.
 */
export function stopProcess(
  proc: KillableProcess,
  group: boolean,
  killGroup: GroupKill = (pid, signal) => process.kill(pid, signal),
  signal: NodeJS.Signals = "SIGTERM"
): void {
  if (group && proc.pid !== undefined) {
    try {
      killGroup(-proc.pid, signal);
      return;
    } catch (error) {
      console.error(`[core] Could not signal process group ${proc.pid}: ${errorMessage(error)}`);
    }
  }
  proc.kill(signal);
}

export class NodeCommandRunner implements CommandRunner {
  async run(
    command: string,
    args: string[],
    options: RunOptions = {}
  ): Promise<Result<CommandOutput, CommandError>> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    // A shell command line gets its own process group on POSIX
    const group = options.shell === true && process.platform !== "win32";

    return new Promise((resolve) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        shell: options.shell ?? false,
        detached: group,
        stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
        windowsHide: true,
      });

      let stdout = "";
      let stderr = "";
      let settled = false;

      const timeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        stopProcess(proc, group);
        resolve(Err({ kind: "timeout", message: `${command} timed out after ${timeoutMs}ms` }));
      }, timeoutMs);

      readText(proc.stdout, (text) => {
        stdout += text;
      });

      readText(proc.stderr, (text) => {
        stderr += text;
      });

      proc.on("close", (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        resolve(Ok({ stdout, stderr, exitCode: code }));
      });

      proc.on("error", (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        resolve(Err(spawnError(command, error)));
      });

      if (options.input !== undefined && proc.stdin) {
        // EPIPE when the command exits before reading its input
        proc.stdin.on("error", (error) => {
          stderr += `stdin: ${error.message}\n`;
        });
        proc.stdin.end(options.input);
      }
    });
  }

  async launch(
    command: string,
    args: string[],
    options: { cwd?: string } = {}
  ): Promise<Result<number | undefined, CommandError>> {
    return new Promise((resolve) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        detached: true,
        stdio: "ignore",
      });

      proc.once("spawn", () => {
        proc.unref();
        resolve(Ok(proc.pid));
      });

      proc.once("error", (error: NodeJS.ErrnoException) => {
        resolve(Err(spawnError(command, error)));
      });
    });
  }
}
