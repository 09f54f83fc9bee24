/**
 * Core domain types for the files package.
 */

export type PathKind = "file" | "folder";

/**
 * A path handed to the OS default-handler mechanism.
 */
export interface OpenedPath {
  /** Absolute path that was opened */
  path: string;
  kind: PathKind;
  /** Opener program (xdg-open, open, cmd) */
  opener: string;
}

export interface FileContent {
  path: string;
  content: string;
  /** Size in bytes */
  size: number;
  lines: number;
}

export interface WrittenFile {
  path: string;
  bytes: number;
  /** True when the file did not exist before the write */
  created: boolean;
}

export interface RecentFile {
  path: string;
  name: string;
}

export interface EditorLaunch {
  path: string;
  editor: string;
  /** Terminal emulator used, or the editor itself when launched directly */
  launcher: string;
}

export type { Result } from "@termdesk/core";
export { Ok, Err } from "@termdesk/core";
