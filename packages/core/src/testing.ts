/**
 * In-process stand-in for CommandRunner.
 * Replies are scripted per command-line prefix; nothing is spawned.
 */

import type { CommandError, CommandOutput, CommandRunner, RunOptions } from "./command.js";
import { Err, Ok, type Result } from "./result.js";

export interface RecordedCall {
  kind: "run" | "launch";
  command: string;
  args: string[];
  options?: RunOptions;
}

export type ScriptedReply = CommandOutput | CommandError;

type Reply = ScriptedReply | ((call: RecordedCall) => ScriptedReply);

function isCommandError(reply: ScriptedReply): reply is CommandError {
  return "kind" in reply;
}

function commandLine(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly replies = new Map<string, Reply>();
  private readonly launchable = new Set<string>();

  /**
   * Script the reply for command lines starting with `prefix`.
   * The longest matching prefix wins.
   */
  on(prefix: string, reply: Reply): this {
    this.replies.set(prefix, reply);
    return this;
  }

  /** Let `launch` succeed for these programs. */
  allowLaunch(...commands: string[]): this {
    for (const command of commands) this.launchable.add(command);
    return this;
  }

  async run(
    command: string,
    args: string[],
    options?: RunOptions
  ): Promise<Result<CommandOutput, CommandError>> {
    const call: RecordedCall = { kind: "run", command, args, options };
    this.calls.push(call);

    const line = commandLine(command, args);
    let best: string | undefined;
    for (const prefix of this.replies.keys()) {
      if (line.startsWith(prefix) && (best === undefined || prefix.length > best.length)) {
        best = prefix;
      }
    }

    const scripted = best === undefined ? undefined : this.replies.get(best);
    if (scripted === undefined) {
      return Err({ kind: "not_found", message: `Command not found: ${command}` });
    }

    const reply = typeof scripted === "function" ? scripted(call) : scripted;
    return isCommandError(reply) ? Err(reply) : Ok(reply);
  }

  async launch(command: string, args: string[]): Promise<Result<number | undefined, CommandError>> {
    this.calls.push({ kind: "launch", command, args });
    if (this.launchable.has(command)) {
      return Ok(4242);
    }
    return Err({ kind: "not_found", message: `Command not found: ${command}` });
  }

  /** Command lines of every recorded call, in order. */
  lines(kind?: RecordedCall["kind"]): string[] {
    return this.calls
      .filter((call) => kind === undefined || call.kind === kind)
      .map((call) => commandLine(call.command, call.args));
  }
}

export function commandOutput(stdout: string, exitCode = 0, stderr = ""): CommandOutput {
  return { stdout, stderr, exitCode };
}
