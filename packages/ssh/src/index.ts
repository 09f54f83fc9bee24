/**
 * @termdesk/ssh
 *
 * Saved SSH connections, connection tests, terminal-window and embedded sessions.
 */

export * from "./core/model.js";
export {
  validateTarget,
  buildSshArgs,
  targetLabel,
  DEFAULT_SSH_PORT,
  TEST_COMMAND,
} from "./core/sshArgs.js";
export type { SessionSpawner, SessionHandle, SessionCallbacks, OutputStream } from "./core/ports/index.js";
export { SshService, TEST_TIMEOUT_MS, type SshServiceOptions, type TargetRef } from "./core/services/SshService.js";
export {
  SshSessionManager,
  MAX_BUFFERED_LINES,
  DEFAULT_CONNECT_TIMEOUT_MS,
  MAX_ENDED_SESSIONS,
  type SessionManagerOptions,
} from "./core/services/SshSessionManager.js";
export { NodeSessionSpawner } from "./infrastructure/runner/NodeSessionSpawner.js";

export { registerAllTools, type Services, type ToolRegistrar } from "./tools/index.js";
