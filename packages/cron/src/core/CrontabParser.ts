/**
 * Line-level crontab parsing and rendering.
 * Only job lines are interpreted; everything else round-trips verbatim.
 */

import { describeSchedule } from "./schedule.js";
import type { CronEntry, CrontabLine, ParsedCrontab } from "./model.js";

const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*\s*=/;
const JOB = /^(\S+\s+\S+\s+\S+\s+\S+\s+\S+)\s+(.+)$/;

export function parseCrontab(text: string): ParsedCrontab {
  const lines: CrontabLine[] = [];
  const skipped: string[] = [];

  const raw = text.split("\n");
  if (raw[raw.length - 1] === "") raw.pop();

  for (const line of raw) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith("@") || ENV_ASSIGNMENT.test(trimmed)) {
      lines.push({ kind: "other", line });
      continue;
    }

    const match = JOB.exec(trimmed);
    if (!match) {
      skipped.push(line);
      lines.push({ kind: "other", line });
      continue;
    }

    lines.push({
      kind: "job",
      line,
      schedule: match[1].split(/\s+/).join(" "),
      command: match[2],
    });
  }

  return { lines, skipped };
}

export function renderCrontab(lines: CrontabLine[]): string {
  if (lines.length === 0) return "";
  return lines.map((l) => l.line).join("\n") + "\n";
}

export function jobLine(schedule: string, command: string): CrontabLine {
  return { kind: "job", line: `${schedule} ${command}`, schedule, command };
}

/**
 * Job lines as entries, numbered in file order.
 */
export function toEntries(lines: CrontabLine[]): CronEntry[] {
  const entries: CronEntry[] = [];
  for (const line of lines) {
    if (line.kind !== "job") continue;
    entries.push({
      index: entries.length,
      line: line.line,
      schedule: line.schedule,
      command: line.command,
      description: describeSchedule(line.schedule),
    });
  }
  return entries;
}

/**
 * Position in `lines` of the job with the given entry index, or -1.
 */
export function findJob(lines: CrontabLine[], index: number): number {
  let seen = 0;
  for (let i = 0; i < lines.length; i++) {
    if (lines[i].kind !== "job") continue;
    if (seen === index) return i;
    seen++;
  }
  return -1;
}
