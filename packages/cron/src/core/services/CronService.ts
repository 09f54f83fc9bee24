/**
 * Cron job management for the current user.
 * Every change is validated first, then installed as a whole new crontab,
 * so a rejected change never touches the installed one.
 */

import { searchLines, type CommandRunner } from "@termdesk/core";

import { findJob, jobLine, parseCrontab, renderCrontab, toEntries } from "../CrontabParser.js";
import type { CrontabStore } from "../ports/index.js";
import {
  Err,
  Ok,
  type CronEntry,
  type CronLogs,
  type CrontabLine,
  type ExplainedEntry,
  type Result,
  type ScheduleCheck,
  type SchedulePreset,
} from "../model.js";
import {
  SCHEDULE_PRESETS,
  describeSchedule,
  explainFields,
  normalizeSchedule,
  validateSchedule,
} from "../schedule.js";

export const CRON_LOG_FILES = ["/var/log/cron", "/var/log/cron.log", "/var/log/syslog"];
const LOG_TAIL_LINES = 100;
const JOURNAL_LINES = 50;

export class CronService {
  constructor(
    private readonly store: CrontabStore,
    private readonly runner: CommandRunner
  ) {}

  /**
   * Confirm the crontab can be read at all.
   */
  async checkAvailable(): Promise<Result<void, string>> {
    const read = await this.store.read();
    return read.ok ? Ok(undefined) : Err(read.error);
  }

  async list(): Promise<Result<CronEntry[], string>> {
    const lines = await this.load();
    if (!lines.ok) return lines;
    return Ok(toEntries(lines.value));
  }

  async add(schedule: string, command: string): Promise<Result<CronEntry, string>> {
    const job = checkJob(schedule, command);
    if (!job.ok) return job;

    const lines = await this.load();
    if (!lines.ok) return lines;

    const next = [...lines.value, jobLine(job.value.schedule, job.value.command)];
    const installed = await this.install(next);
    if (!installed.ok) return installed;

    const entries = toEntries(next);
    return Ok(entries[entries.length - 1]);
  }

  async update(index: number, schedule: string, command: string): Promise<Result<CronEntry, string>> {
    const job = checkJob(schedule, command);
    if (!job.ok) return job;

    const lines = await this.load();
    if (!lines.ok) return lines;

    const position = findJob(lines.value, index);
    if (position < 0) return Err(`Cron job not found: ${index}`);

    const next = [...lines.value];
    next[position] = jobLine(job.value.schedule, job.value.command);
    const installed = await this.install(next);
    if (!installed.ok) return installed;

    return Ok(toEntries(next)[index]);
  }

  async remove(index: number): Promise<Result<CronEntry, string>> {
    const lines = await this.load();
    if (!lines.ok) return lines;

    const position = findJob(lines.value, index);
    if (position < 0) return Err(`Cron job not found: ${index}`);

    const removed = toEntries(lines.value)[index];
    const next = lines.value.filter((_, i) => i !== position);

    const result = next.every((l) => l.line.trim() === "")
      ? await this.store.clear()
      : await this.install(next);
    if (!result.ok) return result;

    return Ok(removed);
  }

  async explain(index: number): Promise<Result<ExplainedEntry, string>> {
    const entries = await this.list();
    if (!entries.ok) return entries;

    const entry = entries.value[index];
    if (entry === undefined) return Err(`Cron job not found: ${index}`);

    const fields = validateSchedule(entry.schedule);
    return Ok({ entry, fields: fields.ok ? explainFields(fields.value) : [] });
  }

  describe(schedule: string): ScheduleCheck {
    const normalized = normalizeSchedule(schedule);
    const valid = validateSchedule(normalized);
    return {
      schedule: normalized,
      valid: valid.ok,
      ...(valid.ok ? {} : { error: valid.error }),
      description: describeSchedule(normalized),
    };
  }

  presets(): readonly SchedulePreset[] {
    return SCHEDULE_PRESETS;
  }

  /**
   * Recent cron activity from the first readable log file, then the journal.
   * `search` narrows the result to lines containing it.
   */
  async viewLogs(search?: string): Promise<Result<CronLogs, string>> {
    const logs = await this.readLogs();
    if (!logs.ok || !search?.trim()) return logs;
    return Ok({ ...logs.value, search: search.trim(), text: searchLines(logs.value.text, search) });
  }

  private async readLogs(): Promise<Result<CronLogs, string>> {
    for (const file of CRON_LOG_FILES) {
      const tail = await this.runner.run("tail", ["-n", String(LOG_TAIL_LINES), file]);
      if (!tail.ok || tail.value.exitCode !== 0) continue;

      const cronLines = searchLines(tail.value.stdout, "cron");
      if (cronLines !== "") {
        return Ok({ source: file, filtered: true, text: cronLines });
      }
      return Ok({ source: file, filtered: false, text: tail.value.stdout });
    }

    const journal = await this.runner.run("journalctl", ["-u", "cron", "-n", String(JOURNAL_LINES), "--no-pager"]);
    if (journal.ok && journal.value.exitCode === 0) {
      return Ok({ source: "journalctl -u cron", filtered: true, text: journal.value.stdout });
    }

    return Err(`No cron logs found (tried: ${[...CRON_LOG_FILES, "journalctl -u cron"].join(", ")})`);
  }

  private async load(): Promise<Result<CrontabLine[], string>> {
    const read = await this.store.read();
    if (!read.ok) return read;

    const parsed = parseCrontab(read.value ?? "");
    for (const line of parsed.skipped) {
      console.error(`[cron] Skipping malformed crontab line: ${line}`);
    }
    return Ok(parsed.lines);
  }

  private install(lines: CrontabLine[]): Promise<Result<void, string>> {
    return this.store.write(renderCrontab(lines));
  }
}

function checkJob(schedule: string, command: string): Result<{ schedule: string; command: string }, string> {
  const normalized = normalizeSchedule(schedule);
  const valid = validateSchedule(normalized);
  if (!valid.ok) return Err(`Invalid schedule: ${valid.error}`);

  const trimmed = command.trim();
  if (trimmed === "") return Err("Command cannot be empty");
  if (/[\r\n]/.test(trimmed)) return Err("Command must be a single line");

  return Ok({ schedule: normalized, command: trimmed });
}
