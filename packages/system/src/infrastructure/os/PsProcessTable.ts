/**
 * ProcessTable backed by `ps aux` (POSIX) or `tasklist` (Windows).
 */

import type { CommandRunner, Platform } from "@termdesk/core";
import type { ProcessTable } from "../../core/ports/index.js";
import { parsePsAux, parseTasklistCsv } from "../../core/processTable.js";
import { Err, Ok, type ProcessRow, type Result } from "../../core/model.js";

const LIST_TIMEOUT_MS = 10000;

export class PsProcessTable implements ProcessTable {
  constructor(
    private readonly runner: CommandRunner,
    private readonly platform: Platform
  ) {}

  async list(): Promise<Result<ProcessRow[], string>> {
    const windows = this.platform === "win32";
    const command = windows ? "tasklist" : "ps";
    const args = windows ? ["/fo", "csv", "/nh"] : ["aux"];

    const result = await this.runner.run(command, args, { timeoutMs: LIST_TIMEOUT_MS });
    if (!result.ok) return Err(result.error.message);

    const { exitCode, stdout, stderr } = result.value;
    if (exitCode !== 0) {
      return Err(`${command} failed: ${stderr.trim() || `exit code ${exitCode}`}`);
    }
    return Ok(windows ? parseTasklistCsv(stdout) : parsePsAux(stdout));
  }
}
