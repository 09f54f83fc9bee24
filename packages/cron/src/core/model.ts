/**
 * Core domain types for the cron package.
 */

/**
 * A scheduled job as shown in the job list.
 */
export interface CronEntry {
  /** Position among the job lines of the crontab, 0-based */
  index: number;
  /** The raw crontab line */
  line: string;
  /** The five schedule fields, single-space separated */
  schedule: string;
  command: string;
  description: string;
}

/**
 * One line of a crontab. Comments, blank lines, environment assignments,
 * `@reboot`-style macros and malformed lines are all `other` and are written
 * back untouched.
 */
export type CrontabLine =
  | { kind: "job"; line: string; schedule: string; command: string }
  | { kind: "other"; line: string };

export interface ParsedCrontab {
  lines: CrontabLine[];
  /** Lines that looked like jobs but had fewer than six fields */
  skipped: string[];
}

export type ScheduleFieldName = "minute" | "hour" | "day" | "month" | "weekday";

export interface ScheduleField {
  name: ScheduleFieldName;
  min: number;
  max: number;
  /** Validation message when the value is out of range or malformed */
  message: string;
}

export interface FieldBreakdown {
  field: ScheduleFieldName;
  value: string;
  /** Allowed range, e.g. "0-59" */
  range: string;
  meaning: string;
}

export interface ExplainedEntry {
  entry: CronEntry;
  fields: FieldBreakdown[];
}

export interface ScheduleCheck {
  schedule: string;
  valid: boolean;
  error?: string;
  description: string;
}

export interface SchedulePreset {
  label: string;
  schedule: string;
}

export interface CronLogs {
  /** Log file or command the lines came from */
  source: string;
  /** True when the lines were narrowed to cron-related entries */
  filtered: boolean;
  /** Text the lines were searched for */
  search?: string;
  text: string;
}

export type { Result } from "@termdesk/core";
export { Ok, Err } from "@termdesk/core";
