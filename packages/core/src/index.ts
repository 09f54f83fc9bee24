export {
  Ok,
  Err,
  map,
  andThen,
  errorMessage,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

export {
  textResponse,
  errorResponse,
  successResponse,
  resultToResponse,
} from "./mcp.js";
export type { TextContent, ToolResponse, Failure } from "./mcp.js";

export { bootstrapServer, runServer, shutdownHandler, startupMessage, SHUTDOWN_SIGNALS, McpServer } from "./server.js";
export type { ServerConfig, ServerBootstrapOptions, ShutdownHooks } from "./server.js";

export { NodeCommandRunner, DEFAULT_TIMEOUT_MS, readText, stopProcess } from "./command.js";
export type { CommandRunner, CommandOutput, CommandError, RunOptions, KillableProcess } from "./command.js";

export { detectPlatform, expandHome, shellQuote, shellJoin } from "./platform.js";
export type { Platform } from "./platform.js";

export { terminalCandidates, launchInTerminal } from "./terminal.js";
export type { TerminalCommand, TerminalOptions } from "./terminal.js";

export { searchLines } from "./text.js";

export {
  SettingsSchema,
  SavedConnectionSchema,
  MAX_RECENT_FILES,
  defaultSettings,
  resolveSettingsDir,
  JsonSettingsStore,
  InMemorySettingsStore,
} from "./settings.js";
export type { Settings, SavedConnection, SettingsStore } from "./settings.js";

export { FakeCommandRunner, commandOutput } from "./testing.js";
export type { RecordedCall, ScriptedReply } from "./testing.js";
