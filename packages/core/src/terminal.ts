/**
 * Launching a program inside a new terminal window.
 * Emulators are tried in order until one spawns.
 */

import type { CommandRunner } from "./command.js";
import { type Platform, shellJoin } from "./platform.js";
import { Err, Ok, type Result } from "./result.js";

export interface TerminalCommand {
  command: string;
  args: string[];
}

export interface TerminalOptions {
  platform: Platform;
  /** Emulator to try first (TERMDESK_TERMINAL); invoked as `<terminal> -e <program>` */
  preferred?: string;
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * The launch commands to try, in order, for running `program` in a window.
 */
export function terminalCandidates(program: string[], options: TerminalOptions): TerminalCommand[] {
  if (options.platform === "win32") {
    return [{ command: "cmd", args: ["/c", "start", "cmd", "/k", ...program] }];
  }

  const candidates: TerminalCommand[] = [];
  if (options.preferred) {
    candidates.push({ command: options.preferred, args: ["-e", ...program] });
  }

  if (options.platform === "darwin") {
    const script = `tell application "Terminal" to do script ${appleScriptString(shellJoin(program))}`;
    candidates.push({ command: "osascript", args: ["-e", script] });
    return candidates;
  }

  candidates.push(
    { command: "gnome-terminal", args: ["--", ...program] },
    { command: "xterm", args: ["-e", ...program] },
    { command: "konsole", args: ["-e", ...program] },
    { command: "lxterminal", args: ["-e", ...program] },
    // xfce4-terminal takes the whole command line as one argument
    { command: "xfce4-terminal", args: ["-e", shellJoin(program)] }
  );
  return candidates;
}

/**
 * Run `program` in a new terminal window.
 * Resolves to the emulator that was used.
 */
export async function launchInTerminal(
  runner: CommandRunner,
  program: string[],
  options: TerminalOptions
): Promise<Result<string, string>> {
  const tried: string[] = [];

  for (const candidate of terminalCandidates(program, options)) {
    const launched = await runner.launch(candidate.command, candidate.args);
    if (launched.ok) {
      return Ok(candidate.command);
    }
    tried.push(candidate.command);
  }

  return Err(`No terminal emulator could be started (tried: ${tried.join(", ")})`);
}
