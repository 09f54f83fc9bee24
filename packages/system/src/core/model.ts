/**
 * Core domain types for the system package.
 */

/**
 * One row of the process table.
 * On Windows, tasklist reports neither owner nor CPU, so those are null.
 */
export interface ProcessRow {
  pid: number;
  name: string;
  user: string | null;
  /** CPU percent */
  cpu: number | null;
  /** "%MEM" percent on POSIX, "Mem Usage" text (e.g. "12,345 K") on Windows */
  mem: string;
  command: string;
}

export interface ProcessQuery {
  /** Case-insensitive substring of the name or command */
  filter?: string;
  /** Exact owner */
  user?: string;
  limit?: number;
}

export type KillSignal = "SIGTERM" | "SIGKILL";

export interface KillOutcome {
  pid: number;
  signal: KillSignal;
}

export type SignalErrorCode = "ESRCH" | "EPERM" | "OTHER";

export interface SignalError {
  code: SignalErrorCode;
  message: string;
}

export interface MemoryInfo {
  totalBytes: number;
  freeBytes: number;
  usedPercent: number;
}

export interface NetworkAddress {
  interface: string;
  family: string;
  address: string;
  internal: boolean;
}

export interface SystemInfo {
  hostname: string;
  platform: string;
  release: string;
  arch: string;
  uptimeSeconds: number;
  /** 1, 5 and 15 minute load averages (zeros on Windows) */
  loadAverage: number[];
  memory: MemoryInfo;
  /** Output of df -h / wmic, or why it is missing */
  disk: string;
  network: NetworkAddress[];
}

export interface SystemLogs {
  source: string;
  /** Text the lines were searched for */
  search?: string;
  text: string;
}

export interface ShellResult {
  command: string;
  /** Working directory after the command */
  cwd: string;
  output: string;
  exitCode: number | null;
  builtin: boolean;
}

export type { Result } from "@termdesk/core";
export { Ok, Err } from "@termdesk/core";
