/**
 * One-shot command runner with a persistent working directory.
 * `cd`, `pwd`, `clear`, `exit` and `quit` are handled here; everything else
 * goes to the platform shell.
 */

import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import { resolve } from "node:path";

import { expandHome, type CommandRunner } from "@termdesk/core";
import { Err, Ok, type Result, type ShellResult } from "../model.js";

export const DEFAULT_SHELL_TIMEOUT_MS = 60000;

export interface ShellServiceOptions {
  cwd?: string;
  timeoutMs?: number;
  home?: string;
  isDirectory?: (path: string) => Promise<boolean>;
}

async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export class ShellService {
  private dir: string;
  private readonly commands: string[] = [];
  private readonly timeoutMs: number;
  private readonly home: string;
  private readonly isDirectory: (path: string) => Promise<boolean>;

  constructor(
    private readonly runner: CommandRunner,
    options: ShellServiceOptions = {}
  ) {
    this.dir = options.cwd ?? process.cwd();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SHELL_TIMEOUT_MS;
    this.home = options.home ?? homedir();
    this.isDirectory = options.isDirectory ?? directoryExists;
  }

  cwd(): string {
    return this.dir;
  }

  history(): string[] {
    return [...this.commands];
  }

  async run(input: string): Promise<Result<ShellResult, string>> {
    const line = input.trim();
    if (!line) return Err("Command cannot be empty");

    const [word = "", ...rest] = line.split(/\s+/);

    switch (word) {
      case "clear":
        this.commands.length = 0;
        return Ok(this.builtin(line, "History cleared"));
      case "exit":
      case "quit":
        this.remember(line);
        return Ok(this.builtin(line, "The shell stays open; close the client to end the session"));
      case "pwd":
        this.remember(line);
        return Ok(this.builtin(line, this.dir));
      case "cd":
        this.remember(line);
        return this.changeDirectory(line, rest.join(" "));
    }

    this.remember(line);
    const result = await this.runner.run(line, [], { shell: true, cwd: this.dir, timeoutMs: this.timeoutMs });
    if (!result.ok) {
      if (result.error.kind === "timeout") {
        return Err(`Command timed out after ${Math.round(this.timeoutMs / 1000)}s`);
      }
      return Err(result.error.message);
    }

    const { stdout, stderr, exitCode } = result.value;
    let output = stdout + stderr;
    if (exitCode !== 0) {
      const status = exitCode === null ? "Command was terminated by a signal" : `Command exited with code ${exitCode}`;
      output = output && !output.endsWith("\n") ? `${output}\n${status}` : `${output}${status}`;
    }

    return Ok({ command: line, cwd: this.dir, output, exitCode, builtin: false });
  }

  private async changeDirectory(line: string, arg: string): Promise<Result<ShellResult, string>> {
    const target = arg ? resolve(this.dir, expandHome(arg, this.home)) : this.home;
    if (!(await this.isDirectory(target))) {
      return Err(`cd: no such directory: ${arg || target}`);
    }
    this.dir = target;
    return Ok(this.builtin(line, target));
  }

  private builtin(command: string, output: string): ShellResult {
    return { command, cwd: this.dir, output, exitCode: 0, builtin: true };
  }

  private remember(line: string): void {
    if (!this.commands.includes(line)) this.commands.push(line);
  }
}
