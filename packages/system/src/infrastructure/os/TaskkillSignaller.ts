/**
 * ProcessSignaller for Windows: `taskkill /PID <pid> [/F]`.
 */

import type { CommandRunner } from "@termdesk/core";
import type { ProcessSignaller } from "../../core/ports/index.js";
import { Err, Ok, type KillSignal, type Result, type SignalError } from "../../core/model.js";

export class TaskkillSignaller implements ProcessSignaller {
  constructor(private readonly runner: CommandRunner) {}

  async signal(pid: number, signal: KillSignal): Promise<Result<void, SignalError>> {
    const args = ["/PID", String(pid)];
    if (signal === "SIGKILL") args.push("/F");

    const result = await this.runner.run("taskkill", args);
    if (!result.ok) return Err({ code: "OTHER", message: result.error.message });

    const { exitCode, stdout, stderr } = result.value;
    if (exitCode === 0) return Ok(undefined);

    const message = (stderr || stdout).trim();
    if (/not found/i.test(message)) return Err({ code: "ESRCH", message });
    if (/access is denied/i.test(message)) return Err({ code: "EPERM", message });
    return Err({ code: "OTHER", message: message || `taskkill exited with code ${exitCode}` });
  }
}
