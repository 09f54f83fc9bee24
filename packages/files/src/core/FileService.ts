/**
 * File and folder operations.
 * Opening goes through the platform's default handler; editing in a terminal
 * goes through the first terminal emulator that starts.
 */

import { existsSync, statSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { basename, dirname, resolve } from "node:path";

import {
  MAX_RECENT_FILES,
  expandHome,
  launchInTerminal,
  map,
  tryCatchAsync,
  type CommandRunner,
  type Platform,
  type SettingsStore,
} from "@termdesk/core";

import { Err, Ok, type EditorLaunch, type FileContent, type OpenedPath, type RecentFile, type Result, type WrittenFile } from "./model.js";

export interface FileServiceOptions {
  platform: Platform;
  /** Terminal emulator to try first */
  terminal?: string;
}

const OPEN_TIMEOUT_MS = 10000;

type PathKind = "file" | "folder";

function pathKind(path: string): PathKind | undefined {
  try {
    return statSync(path).isDirectory() ? "folder" : "file";
  } catch {
    return undefined;
  }
}

/**
 * The default-handler command for a path.
 */
export function openerCommand(platform: Platform, path: string): { command: string; args: string[] } {
  switch (platform) {
    case "win32":
      // The empty string is start's window title
      return { command: "cmd", args: ["/c", "start", "", path] };
    case "darwin":
      return { command: "open", args: [path] };
    case "linux":
      return { command: "xdg-open", args: [path] };
  }
}

export class FileService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly settings: SettingsStore,
    private readonly options: FileServiceOptions
  ) {}

  /**
   * Open a file or folder with its associated application.
   */
  async openPath(path: string): Promise<Result<OpenedPath, string>> {
    const target = resolve(expandHome(path));
    const kind = pathKind(target);
    if (kind === undefined) {
      return Err(`Path not found: ${path}`);
    }

    const opener = openerCommand(this.options.platform, target);
    const result = await this.runner.run(opener.command, opener.args, { timeoutMs: OPEN_TIMEOUT_MS });

    if (!result.ok) {
      return Err(
        result.error.kind === "not_found" ? `Opener not available: ${opener.command}` : result.error.message
      );
    }

    const { exitCode, stderr } = result.value;
    if (exitCode !== 0) {
      return Err(`No application associated with ${path}: ${stderr.trim() || `exit code ${exitCode}`}`);
    }

    if (kind === "file") this.remember(target);

    return Ok({ path: target, kind, opener: opener.command });
  }

  async readFile(path: string): Promise<Result<FileContent, string>> {
    const target = resolve(expandHome(path));
    const kind = pathKind(target);
    if (kind === undefined) {
      return Err(`Path not found: ${path}`);
    }
    if (kind === "folder") {
      return Err(`Not a file: ${path}`);
    }

    const read = await tryCatchAsync(() => readFile(target, "utf-8"));
    if (!read.ok) {
      return Err(`Failed to read ${path}: ${read.error}`);
    }

    this.remember(target);
    const content = read.value;
    return Ok({
      path: target,
      content,
      size: Buffer.byteLength(content, "utf-8"),
      lines: content === "" ? 0 : content.split("\n").length,
    });
  }

  async writeFile(path: string, content: string): Promise<Result<WrittenFile, string>> {
    const target = resolve(expandHome(path));
    const dir = dirname(target);
    if (!existsSync(dir)) {
      return Err(`Directory not found: ${dir}`);
    }
    const kind = pathKind(target);
    if (kind === "folder") {
      return Err(`Not a file: ${path}`);
    }

    const created = kind === undefined;
    const written = await tryCatchAsync(() => writeFile(target, content, "utf-8"));
    if (!written.ok) {
      return Err(`Failed to write ${path}: ${written.error}`);
    }

    this.remember(target);
    return Ok({ path: target, bytes: Buffer.byteLength(content, "utf-8"), created });
  }

  /**
   * Recent files that still exist, most recent first.
   */
  listRecent(): RecentFile[] {
    return this.settings
      .load()
      .recentFiles.filter((path) => existsSync(path))
      .map((path) => ({ path, name: basename(path) }));
  }

  forgetRecent(path: string): Result<string[], string> {
    const target = resolve(expandHome(path));
    const { recentFiles } = this.settings.load();
    if (!recentFiles.includes(target)) {
      return Err(`Not in recent files: ${path}`);
    }

    const next = this.settings.update((s) => ({
      ...s,
      recentFiles: s.recentFiles.filter((p) => p !== target),
    }));
    return map(next, (s) => s.recentFiles);
  }

  preferredEditor(): string {
    return this.settings.load().preferredEditor;
  }

  /**
   * Open a file in a terminal editor (nano, vim, ...) in a new window.
   * Passing `editor` also makes it the preferred editor.
   */
  async openInEditor(path: string, editor?: string): Promise<Result<EditorLaunch, string>> {
    const target = resolve(expandHome(path));
    if (!existsSync(target)) {
      return Err(`Path not found: ${path}`);
    }

    const chosen = editor?.trim() || this.preferredEditor();
    if (editor?.trim() && chosen !== this.preferredEditor()) {
      const saved = this.settings.update((s) => ({ ...s, preferredEditor: chosen }));
      if (!saved.ok) return saved;
    }

    const launched = await launchInTerminal(this.runner, [chosen, target], {
      platform: this.options.platform,
      preferred: this.options.terminal,
    });
    if (launched.ok) {
      this.remember(target);
      return Ok({ path: target, editor: chosen, launcher: launched.value });
    }

    // No terminal window: start the editor on its own
    if (this.options.platform !== "win32") {
      const direct = await this.runner.launch(chosen, [target]);
      if (direct.ok) {
        this.remember(target);
        return Ok({ path: target, editor: chosen, launcher: chosen });
      }
    }

    return Err(`Could not find a terminal emulator or ${chosen}`);
  }

  /** Recent-file bookkeeping never fails the operation that triggered it. */
  private remember(path: string): void {
    const saved = this.settings.update((s) => ({
      ...s,
      recentFiles: [path, ...s.recentFiles.filter((p) => p !== path)].slice(0, MAX_RECENT_FILES),
    }));
    if (!saved.ok) {
      console.error(`[files] Could not record ${path} as recent: ${saved.error}`);
    }
  }
}
