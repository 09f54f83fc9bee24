/**
 * @termdesk/system
 *
 * Process list and kill, system overview and logs, and a one-shot shell.
 */

export * from "./core/model.js";
export { parsePsAux, parseTasklistCsv, processName } from "./core/processTable.js";
export type { ProcessTable, ProcessSignaller } from "./core/ports/index.js";
export { ProcessService, DEFAULT_PROCESS_LIMIT } from "./core/services/ProcessService.js";
export {
  SystemService,
  SYSTEM_LOG_FILES,
  NO_LOGS_MESSAGE,
  type OsSource,
} from "./core/services/SystemService.js";
export {
  ShellService,
  DEFAULT_SHELL_TIMEOUT_MS,
  type ShellServiceOptions,
} from "./core/services/ShellService.js";
export { PsProcessTable } from "./infrastructure/os/PsProcessTable.js";
export { NodeProcessSignaller } from "./infrastructure/os/NodeProcessSignaller.js";
export { TaskkillSignaller } from "./infrastructure/os/TaskkillSignaller.js";
export { InMemoryProcessTable } from "./infrastructure/memory/InMemoryProcessTable.js";

export { registerAllTools, type Services, type ToolRegistrar } from "./tools/index.js";
