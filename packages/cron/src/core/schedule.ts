/**
 * Five-field cron schedules: range validation, English descriptions and
 * the named presets offered when creating a job.
 *
 * Only field syntax and ranges are checked here; cron itself decides when
 * a job runs.
 */

import {
  Err,
  Ok,
  type FieldBreakdown,
  type Result,
  type ScheduleField,
  type ScheduleFieldName,
  type SchedulePreset,
} from "./model.js";

export const SCHEDULE_FIELDS: readonly ScheduleField[] = [
  { name: "minute", min: 0, max: 59, message: "Minute must be 0-59" },
  { name: "hour", min: 0, max: 23, message: "Hour must be 0-23" },
  { name: "day", min: 1, max: 31, message: "Day must be 1-31" },
  { name: "month", min: 1, max: 12, message: "Month must be 1-12" },
  { name: "weekday", min: 0, max: 6, message: "Weekday must be 0-6 (0=Sunday)" },
];

export const FIELD_COUNT_MESSAGE = "Schedule must have exactly 5 fields: minute hour day month weekday";

export const SCHEDULE_PRESETS: readonly SchedulePreset[] = [
  { label: "Every minute", schedule: "* * * * *" },
  { label: "Every 5 minutes", schedule: "*/5 * * * *" },
  { label: "Every 15 minutes", schedule: "*/15 * * * *" },
  { label: "Every 30 minutes", schedule: "*/30 * * * *" },
  { label: "Every hour", schedule: "0 * * * *" },
  { label: "Every 2 hours", schedule: "0 */2 * * *" },
  { label: "Every 6 hours", schedule: "0 */6 * * *" },
  { label: "Daily at midnight", schedule: "0 0 * * *" },
  { label: "Daily at 6 AM", schedule: "0 6 * * *" },
  { label: "Daily at 9 AM", schedule: "0 9 * * *" },
  { label: "Daily at 6 PM", schedule: "0 18 * * *" },
  { label: "Weekly (Monday midnight)", schedule: "0 0 * * 1" },
  { label: "Weekly (Sunday 2 AM)", schedule: "0 2 * * 0" },
  { label: "Monthly (1st at midnight)", schedule: "0 0 1 * *" },
];

const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

const WEEKDAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const FIXED_PHRASES: Record<string, string> = {
  "* * * * *": "Every minute",
  "0 * * * *": "Every hour",
  "0 0 * * *": "Daily at midnight (00:00)",
  "0 9 * * *": "Daily at 9:00 AM",
  "0 18 * * *": "Daily at 6:00 PM",
  "0 0 * * 0": "Weekly on Sunday at midnight",
  "0 0 * * 1": "Weekly on Monday at midnight",
  "0 0 1 * *": "Monthly on the 1st day at midnight",
};

const STEP = /^\*\/(\d+)$/;
const NUMBER = /^\d+$/;
const RANGE = /^(\d+)-(\d+)$/;

export type ScheduleFields = Record<ScheduleFieldName, string>;

/**
 * Split a schedule on whitespace. Undefined unless there are exactly five fields.
 */
export function splitSchedule(schedule: string): ScheduleFields | undefined {
  const parts = schedule.trim().split(/\s+/);
  if (parts.length !== 5) return undefined;
  const [minute, hour, day, month, weekday] = parts;
  return { minute, hour, day, month, weekday };
}

/**
 * Collapse runs of whitespace so schedules compare and store consistently.
 */
export function normalizeSchedule(schedule: string): string {
  return schedule.trim().split(/\s+/).join(" ");
}

function inRange(value: number, field: ScheduleField): boolean {
  return value >= field.min && value <= field.max;
}

/**
 * Accepts `*`, `*\/N`, a number, `a-b`, or a comma list of numbers and ranges.
 */
export function isValidField(value: string, field: ScheduleField): boolean {
  if (value === "*") return true;

  const step = STEP.exec(value);
  if (step) {
    const n = Number(step[1]);
    return n >= 1 && n <= field.max;
  }

  return value.split(",").every((part) => {
    if (NUMBER.test(part)) {
      return inRange(Number(part), field);
    }
    const range = RANGE.exec(part);
    if (!range) return false;
    const start = Number(range[1]);
    const end = Number(range[2]);
    return inRange(start, field) && inRange(end, field) && start <= end;
  });
}

/**
 * Check a schedule field by field, reporting the first bad one.
 *
 * @example
 * validateSchedule("*\/5 * * * *") // => Ok({ minute: "*\/5", hour: "*", ... })
 * validateSchedule("60 * * * *")   // => Err("Minute must be 0-59")
 */
export function validateSchedule(schedule: string): Result<ScheduleFields, string> {
  const fields = splitSchedule(schedule);
  if (!fields) {
    return Err(FIELD_COUNT_MESSAGE);
  }

  for (const field of SCHEDULE_FIELDS) {
    if (!isValidField(fields[field.name], field)) {
      return Err(field.message);
    }
  }
  return Ok(fields);
}

function stepOf(value: string): string | undefined {
  return STEP.exec(value)?.[1];
}

function describeTime(minute: string, hour: string): string[] {
  const minuteStep = stepOf(minute);
  const hourStep = stepOf(hour);

  if (minute === "*" && hour === "*") {
    return ["every minute"];
  }
  if (hour === "*") {
    return [minuteStep ? `every ${minuteStep} minutes` : `at minute ${minute} of every hour`];
  }
  if (minute === "*") {
    return [hourStep ? `every minute of every ${hourStep} hours` : `every minute at hour ${hour}`];
  }
  if (NUMBER.test(minute) && NUMBER.test(hour)) {
    return [`at ${hour.padStart(2, "0")}:${minute.padStart(2, "0")}`];
  }
  return [
    minuteStep ? `every ${minuteStep} minutes` : `at minute ${minute}`,
    hourStep ? `every ${hourStep} hours` : `at hour ${hour}`,
  ];
}

function namedValue(value: string, names: string[], offset: number): string | undefined {
  if (!NUMBER.test(value)) return undefined;
  return names[Number(value) - offset];
}

function describeDate(day: string, month: string, weekday: string): string[] {
  const clauses: string[] = [];
  if (day !== "*") {
    clauses.push(`on day ${day}`);
  }
  if (month !== "*") {
    const name = namedValue(month, MONTH_NAMES, 1);
    clauses.push(name ? `in ${name}` : `in month ${month}`);
  }
  if (weekday !== "*") {
    const name = namedValue(weekday, WEEKDAY_NAMES, 0);
    clauses.push(name ? `on ${name}` : `on weekday ${weekday}`);
  }
  return clauses;
}

/**
 * English description of a schedule.
 *
 * @example
 * describeSchedule("0 9 * * *")    // => "Daily at 9:00 AM"
 * describeSchedule("30 2 * * 1")   // => "at 02:30 on Monday"
 * describeSchedule("15 * 1 * *")   // => "at minute 15 of every hour on day 1"
 */
export function describeSchedule(schedule: string): string {
  const fields = splitSchedule(schedule);
  if (!fields) {
    return "Invalid schedule format";
  }

  const normalized = normalizeSchedule(schedule);
  const fixed = FIXED_PHRASES[normalized];
  if (fixed) return fixed;

  const { minute, hour, day, month, weekday } = fields;
  const restIsWildcard = day === "*" && month === "*" && weekday === "*";

  const minuteStep = stepOf(minute);
  if (minuteStep && hour === "*" && restIsWildcard) {
    return `Every ${minuteStep} minutes`;
  }
  const hourStep = stepOf(hour);
  if (minute === "0" && hourStep && restIsWildcard) {
    return `Every ${hourStep} hours`;
  }

  return [...describeTime(minute, hour), ...describeDate(day, month, weekday)].join(" ");
}

const UNITS: Record<ScheduleFieldName, { one: string; many: string; names?: { list: string[]; offset: number } }> = {
  minute: { one: "minute", many: "minutes" },
  hour: { one: "hour", many: "hours" },
  day: { one: "day of the month", many: "days of the month" },
  month: { one: "month", many: "months", names: { list: MONTH_NAMES, offset: 1 } },
  weekday: { one: "weekday", many: "weekdays", names: { list: WEEKDAY_NAMES, offset: 0 } },
};

function fieldMeaning(name: ScheduleFieldName, value: string): string {
  const unit = UNITS[name];
  const label = (v: string): string => (unit.names && namedValue(v, unit.names.list, unit.names.offset)) || v;

  if (value === "*") return `every ${unit.one}`;

  const step = stepOf(value);
  if (step) return `every ${step} ${unit.many}`;

  const parts = value.split(",").map((part) => {
    const range = RANGE.exec(part);
    return range ? `${label(range[1])} through ${label(range[2])}` : label(part);
  });
  return parts.length === 1 && NUMBER.test(value)
    ? `${unit.one} ${parts[0]}`
    : `${unit.many} ${parts.join(", ")}`;
}

/**
 * Per-field breakdown of a valid schedule.
 */
export function explainFields(fields: ScheduleFields): FieldBreakdown[] {
  return SCHEDULE_FIELDS.map((field) => ({
    field: field.name,
    value: fields[field.name],
    range: `${field.min}-${field.max}`,
    meaning: fieldMeaning(field.name, fields[field.name]),
  }));
}
