/**
 * @termdesk/cron
 *
 * List, add, edit and delete the current user's cron jobs.
 */

export * from "./core/model.js";
export {
  SCHEDULE_FIELDS,
  SCHEDULE_PRESETS,
  FIELD_COUNT_MESSAGE,
  validateSchedule,
  describeSchedule,
  explainFields,
  normalizeSchedule,
  splitSchedule,
  isValidField,
  type ScheduleFields,
} from "./core/schedule.js";
export { parseCrontab, renderCrontab, toEntries } from "./core/CrontabParser.js";
export type { CrontabStore } from "./core/ports/index.js";
export { CronService, CRON_LOG_FILES } from "./core/services/CronService.js";
export { CrontabCli } from "./infrastructure/cli/CrontabCli.js";
export { InMemoryCrontab } from "./infrastructure/memory/InMemoryCrontab.js";

export { registerAllTools, type Services, type ToolRegistrar } from "./tools/index.js";
