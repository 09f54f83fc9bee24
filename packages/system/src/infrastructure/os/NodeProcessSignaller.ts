/**
 * ProcessSignaller using process.kill (POSIX).
 */

import { errorMessage } from "@termdesk/core";
import type { ProcessSignaller } from "../../core/ports/index.js";
import { Err, Ok, type KillSignal, type Result, type SignalError } from "../../core/model.js";

type KillFn = (pid: number, signal: KillSignal) => void;

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

export class NodeProcessSignaller implements ProcessSignaller {
  constructor(private readonly kill: KillFn = (pid, signal) => process.kill(pid, signal)) {}

  async signal(pid: number, signal: KillSignal): Promise<Result<void, SignalError>> {
    try {
      this.kill(pid, signal);
      return Ok(undefined);
    } catch (e) {
      const code = errnoCode(e);
      if (code === "ESRCH" || code === "EPERM") {
        return Err({ code, message: errorMessage(e) });
      }
      return Err({ code: "OTHER", message: errorMessage(e) });
    }
  }
}
