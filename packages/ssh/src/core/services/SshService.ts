/**
 * Saved connections, connection tests and terminal-window sessions.
 */

import { existsSync } from "node:fs";
import { nanoid } from "nanoid";

import {
  andThen,
  launchInTerminal,
  type CommandRunner,
  type Platform,
  type SettingsStore,
} from "@termdesk/core";

import { buildSshArgs, targetLabel, validateTarget } from "../sshArgs.js";
import {
  Err,
  Ok,
  type ConnectionInput,
  type ConnectionTest,
  type Result,
  type SavedConnection,
  type SavedConnectionResult,
  type SshTarget,
  type TargetInput,
  type TerminalLaunch,
} from "../model.js";

export const TEST_TIMEOUT_MS = 15000;

export interface SshServiceOptions {
  platform: Platform;
  /** Terminal emulator to try first */
  terminal?: string;
  keyExists?: (path: string) => boolean;
  newId?: () => string;
}

/** Either a saved connection (by id or name) or an ad-hoc target. */
export type TargetRef = { connection: string } | TargetInput;

export class SshService {
  private readonly keyExists: (path: string) => boolean;
  private readonly newId: () => string;

  constructor(
    private readonly runner: CommandRunner,
    private readonly settings: SettingsStore,
    private readonly options: SshServiceOptions
  ) {
    this.keyExists = options.keyExists ?? existsSync;
    this.newId = options.newId ?? (() => nanoid(8));
  }

  listConnections(): SavedConnection[] {
    return this.settings.load().sshConnections;
  }

  /**
   * Find a saved connection by id, then by name.
   */
  getConnection(idOrName: string): Result<SavedConnection, string> {
    const connections = this.listConnections();
    const found = connections.find((c) => c.id === idOrName) ?? connections.find((c) => c.name === idOrName);
    return found ? Ok(found) : Err(`Connection not found: ${idOrName}`);
  }

  /**
   * Add a connection, or replace the one with `input.id`.
   * A missing key file is saved anyway, with a warning.
   */
  saveConnection(input: ConnectionInput): Result<SavedConnectionResult, string> {
    const name = input.name.trim();
    if (!name) return Err("Connection name is required");

    const target = validateTarget(input);
    if (!target.ok) return target;

    const existing = this.listConnections();
    if (input.id !== undefined && !existing.some((c) => c.id === input.id)) {
      return Err(`Connection not found: ${input.id}`);
    }

    const connection: SavedConnection = { id: input.id ?? this.newId(), name, ...target.value };
    const created = input.id === undefined;

    const saved = this.settings.update((s) => ({
      ...s,
      sshConnections: created
        ? [...s.sshConnections, connection]
        : s.sshConnections.map((c) => (c.id === connection.id ? connection : c)),
    }));
    if (!saved.ok) return saved;

    const keyFile = connection.keyFile;
    return Ok({
      connection,
      created,
      ...(keyFile && !this.keyExists(keyFile) ? { warning: `Key file not found: ${keyFile}` } : {}),
    });
  }

  removeConnection(idOrName: string): Result<SavedConnection, string> {
    const found = this.getConnection(idOrName);
    if (!found.ok) return found;

    const saved = this.settings.update((s) => ({
      ...s,
      sshConnections: s.sshConnections.filter((c) => c.id !== found.value.id),
    }));
    return saved.ok ? found : saved;
  }

  resolveTarget(ref: TargetRef): Result<SshTarget, string> {
    if ("connection" in ref) {
      return andThen(this.getConnection(ref.connection), ({ host, user, port, keyFile }) =>
        validateTarget({ host, user, port, keyFile })
      );
    }
    return validateTarget(ref);
  }

  /**
   * Log in non-interactively and run one echo.
   */
  async testConnection(target: SshTarget): Promise<Result<ConnectionTest, string>> {
    const args = buildSshArgs(target, "test", this.keyExists);
    const result = await this.runner.run("ssh", args, { timeoutMs: TEST_TIMEOUT_MS });

    if (!result.ok) {
      return Err(result.error.kind === "timeout" ? "Connection test timed out" : result.error.message);
    }

    const { exitCode, stdout, stderr } = result.value;
    if (exitCode !== 0) {
      return Err(`Connection test failed (exit ${exitCode}): ${stderr.trim()}`);
    }
    return Ok({ target: targetLabel(target), output: stdout.trim() });
  }

  /**
   * Start an interactive ssh client in a new terminal window.
   */
  async openTerminal(target: SshTarget): Promise<Result<TerminalLaunch, string>> {
    const program = ["ssh", ...buildSshArgs(target, "interactive", this.keyExists)];
    const launched = await launchInTerminal(this.runner, program, {
      platform: this.options.platform,
      preferred: this.options.terminal,
    });

    if (!launched.ok) {
      console.error(`[ssh] ${launched.error}`);
      return Err("Could not open a terminal window");
    }
    return Ok({ target: targetLabel(target), launcher: launched.value });
  }
}
