/**
 * Process listing and termination.
 */

import type { ProcessSignaller, ProcessTable } from "../ports/index.js";
import { Err, Ok, type KillOutcome, type ProcessQuery, type ProcessRow, type Result } from "../model.js";

export const DEFAULT_PROCESS_LIMIT = 100;

export class ProcessService {
  constructor(
    private readonly table: ProcessTable,
    private readonly signaller: ProcessSignaller,
    /** The server's own pid, which is never signalled */
    private readonly selfPid: number = process.pid
  ) {}

  /**
   * Rows in table order; `limit` applies after filtering.
   */
  async list(query: ProcessQuery = {}): Promise<Result<ProcessRow[], string>> {
    const rows = await this.table.list();
    if (!rows.ok) return rows;

    const filter = query.filter?.trim().toLowerCase();
    const limit = query.limit ?? DEFAULT_PROCESS_LIMIT;

    const matching = rows.value.filter((row) => {
      if (query.user && row.user !== query.user) return false;
      if (filter && !row.name.toLowerCase().includes(filter) && !row.command.toLowerCase().includes(filter)) {
        return false;
      }
      return true;
    });

    return Ok(matching.slice(0, limit));
  }

  /**
   * Send SIGTERM (or SIGKILL with `force`) to exactly one process.
   */
  async kill(pid: number, options: { force?: boolean } = {}): Promise<Result<KillOutcome, string>> {
    if (!Number.isInteger(pid) || pid <= 0) {
      return Err("PID must be a positive integer");
    }
    if (pid === this.selfPid) {
      return Err(`Refusing to signal termdesk's own process (${pid})`);
    }

    const signal = options.force ? "SIGKILL" : "SIGTERM";
    const sent = await this.signaller.signal(pid, signal);
    if (!sent.ok) {
      switch (sent.error.code) {
        case "ESRCH":
          return Err(`No such process: ${pid}`);
        case "EPERM":
          return Err(`Permission denied: cannot signal process ${pid}`);
        case "OTHER":
          return Err(sent.error.message);
      }
    }

    return Ok({ pid, signal });
  }
}
