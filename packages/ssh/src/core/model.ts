/**
 * Core domain types for the ssh package.
 */

import type { SavedConnection } from "@termdesk/core";

/**
 * Where to connect. Passwords are never stored or passed on the command line;
 * the ssh client prompts for them itself in a terminal window.
 */
export interface SshTarget {
  host: string;
  user: string;
  port: number;
  keyFile?: string;
}

/**
 * - interactive: a terminal window, with a pseudo-terminal (-t)
 * - session: an embedded session over pipes, non-interactive auth only
 * - test: a batch-mode login that runs one echo
 */
export type SshMode = "interactive" | "session" | "test";

export interface TargetInput {
  host: string;
  user: string;
  port?: number;
  keyFile?: string;
}

export interface ConnectionInput extends TargetInput {
  /** Present when editing an existing connection */
  id?: string;
  name: string;
}

export interface SavedConnectionResult {
  connection: SavedConnection;
  created: boolean;
  /** Set when the key file does not exist (the connection is still saved) */
  warning?: string;
}

export interface ConnectionTest {
  target: string;
  output: string;
}

export interface TerminalLaunch {
  target: string;
  launcher: string;
}

export type SessionStatus = "connecting" | "connected" | "closed" | "failed";

export interface SessionInfo {
  id: string;
  /** user@host:port */
  target: string;
  pid: number | null;
  status: SessionStatus;
  startedAt: string;
  endedAt?: string;
  exitCode?: number | null;
  /** Buffered output lines */
  lines: number;
}

export interface SessionOutput {
  id: string;
  status: SessionStatus;
  lines: string[];
  /** Lines currently buffered */
  total: number;
}

export type { SavedConnection, Result } from "@termdesk/core";
export { Ok, Err } from "@termdesk/core";
