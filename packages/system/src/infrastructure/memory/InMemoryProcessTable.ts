/**
 * In-memory process table that can also be signalled, for tests.
 * Rows listed as protected refuse signals with EPERM, as root-owned
 * processes do for an unprivileged user.
 */

import type { ProcessSignaller, ProcessTable } from "../../core/ports/index.js";
import { Err, Ok, type KillSignal, type ProcessRow, type Result, type SignalError } from "../../core/model.js";

export class InMemoryProcessTable implements ProcessTable, ProcessSignaller {
  readonly signals: Array<{ pid: number; signal: KillSignal }> = [];
  private rows: ProcessRow[];
  private readonly protectedPids: Set<number>;

  constructor(rows: ProcessRow[] = [], protectedPids: number[] = []) {
    this.rows = [...rows];
    this.protectedPids = new Set(protectedPids);
  }

  async list(): Promise<Result<ProcessRow[], string>> {
    return Ok([...this.rows]);
  }

  async signal(pid: number, signal: KillSignal): Promise<Result<void, SignalError>> {
    if (!this.rows.some((r) => r.pid === pid)) {
      return Err({ code: "ESRCH", message: "kill ESRCH" });
    }
    if (this.protectedPids.has(pid)) {
      return Err({ code: "EPERM", message: "kill EPERM" });
    }

    this.signals.push({ pid, signal });
    this.rows = this.rows.filter((r) => r.pid !== pid);
    return Ok(undefined);
  }
}
