/**
 * User settings persisted as JSON in $TERMDESK_HOME/settings.json.
 * Saved SSH connections, recent files and the preferred editor live here.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import * as z from "zod/v4";

import { Err, Ok, errorMessage, type Result } from "./result.js";

export const MAX_RECENT_FILES = 10;

export const SavedConnectionSchema = z.object({
  id: z.string(),
  name: z.string(),
  host: z.string(),
  user: z.string(),
  port: z.number().int().min(1).max(65535).default(22),
  keyFile: z.string().optional(),
});

export const SettingsSchema = z.object({
  sshConnections: z.array(SavedConnectionSchema).default(() => []),
  recentFiles: z.array(z.string()).default(() => []),
  preferredEditor: z.string().min(1).default("nano"),
});

export type SavedConnection = z.infer<typeof SavedConnectionSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

export interface SettingsStore {
  load(): Settings;
  save(settings: Settings): Result<Settings, string>;
  /** Load, apply `fn`, save and return the new settings. */
  update(fn: (settings: Settings) => Settings): Result<Settings, string>;
}

export function resolveSettingsDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.TERMDESK_HOME || join(homedir(), ".termdesk");
}

export class JsonSettingsStore implements SettingsStore {
  readonly path: string;

  constructor(private readonly dir: string = resolveSettingsDir()) {
    this.path = join(dir, "settings.json");
  }

  load(): Settings {
    if (!existsSync(this.path)) {
      return defaultSettings();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (e) {
      console.error(`[settings] Could not read ${this.path}, using defaults: ${errorMessage(e)}`);
      return defaultSettings();
    }

    const parsed = SettingsSchema.safeParse(raw);
    if (!parsed.success) {
      console.error(`[settings] Invalid settings in ${this.path}, using defaults: ${parsed.error.message}`);
      return defaultSettings();
    }
    return parsed.data;
  }

  /** Writes to a temp file, then renames it over settings.json. */
  save(settings: Settings): Result<Settings, string> {
    try {
      mkdirSync(this.dir, { recursive: true });
      const tempPath = `${this.path}.tmp`;
      writeFileSync(tempPath, JSON.stringify(settings, null, 2), "utf-8");
      renameSync(tempPath, this.path);
      return Ok(settings);
    } catch (e) {
      return Err(`Could not save settings to ${this.path}: ${errorMessage(e)}`);
    }
  }

  update(fn: (settings: Settings) => Settings): Result<Settings, string> {
    return this.save(fn(this.load()));
  }
}

export class InMemorySettingsStore implements SettingsStore {
  private settings: Settings;

  constructor(initial: Partial<Settings> = {}) {
    this.settings = { ...defaultSettings(), ...initial };
  }

  load(): Settings {
    return structuredClone(this.settings);
  }

  save(settings: Settings): Result<Settings, string> {
    this.settings = structuredClone(settings);
    return Ok(this.load());
  }

  update(fn: (settings: Settings) => Settings): Result<Settings, string> {
    return this.save(fn(this.load()));
  }
}
