/**
 * CrontabStore backed by the `crontab` binary.
 */

import type { CommandOutput, CommandRunner } from "@termdesk/core";
import type { CrontabStore } from "../../core/ports/index.js";
import { Err, Ok, type Result } from "../../core/model.js";

const NO_CRONTAB = /no crontab for/i;
const CRONTAB_TIMEOUT_MS = 10000;

function failure(args: string[], output: CommandOutput): string {
  return output.stderr.trim() || `crontab ${args.join(" ")} exited with code ${output.exitCode}`;
}

export class CrontabCli implements CrontabStore {
  constructor(private readonly runner: CommandRunner) {}

  async read(): Promise<Result<string | null, string>> {
    const result = await this.runner.run("crontab", ["-l"], { timeoutMs: CRONTAB_TIMEOUT_MS });
    if (!result.ok) return Err(result.error.message);

    const output = result.value;
    if (output.exitCode === 0) return Ok(output.stdout);
    if (NO_CRONTAB.test(output.stderr)) return Ok(null);
    return Err(failure(["-l"], output));
  }

  async write(text: string): Promise<Result<void, string>> {
    const result = await this.runner.run("crontab", ["-"], { input: text, timeoutMs: CRONTAB_TIMEOUT_MS });
    if (!result.ok) return Err(result.error.message);
    if (result.value.exitCode !== 0) return Err(failure(["-"], result.value));
    return Ok(undefined);
  }

  async clear(): Promise<Result<void, string>> {
    const result = await this.runner.run("crontab", ["-r"], { timeoutMs: CRONTAB_TIMEOUT_MS });
    if (!result.ok) return Err(result.error.message);

    const output = result.value;
    if (output.exitCode !== 0 && !NO_CRONTAB.test(output.stderr)) {
      return Err(failure(["-r"], output));
    }
    return Ok(undefined);
  }
}
