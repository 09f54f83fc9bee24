/**
 * Embedded SSH sessions: the ssh client runs with piped stdio, commands are
 * written to its stdin and its output is buffered for reading.
 */

import { nanoid } from "nanoid";
import stripAnsi from "strip-ansi";

import { CONNECT_TIMEOUT_SECONDS, buildSshArgs, targetLabel } from "../sshArgs.js";
import type { OutputStream, SessionHandle, SessionSpawner } from "../ports/index.js";
import {
  Err,
  Ok,
  type Result,
  type SessionInfo,
  type SessionOutput,
  type SessionStatus,
  type SshTarget,
} from "../model.js";

export const MAX_BUFFERED_LINES = 500;
/** Ended sessions kept for reading; older ones are dropped */
export const MAX_ENDED_SESSIONS = 20;
/** ssh gives up after its own ConnectTimeout; this leaves room for authentication */
export const DEFAULT_CONNECT_TIMEOUT_MS = CONNECT_TIMEOUT_SECONDS * 1000 + 5000;
/** ssh's own exit code for connection and authentication errors */
const SSH_ERROR_EXIT = 255;
const READY_PREFIX = "__termdesk_ready_";

export interface SessionManagerOptions {
  /** How long to wait for the remote shell to answer before giving up */
  connectTimeoutMs?: number;
  maxLines?: number;
  maxEndedSessions?: number;
  keyExists?: (path: string) => boolean;
  newId?: () => string;
}

interface Session {
  id: string;
  target: SshTarget;
  handle: SessionHandle | undefined;
  status: SessionStatus;
  startedAt: string;
  endedAt?: string;
  exitCode?: number | null;
  lines: string[];
  partial: string;
  stderr: string;
  history: string[];
  /** Echoed by the remote shell once the login has gone through */
  readyMarker: string;
  onReady: (() => void) | undefined;
}

export class SshSessionManager {
  private readonly active = new Map<string, Session>();
  private readonly ended = new Map<string, Session>();
  private readonly connectTimeoutMs: number;
  private readonly maxLines: number;
  private readonly maxEnded: number;
  private readonly keyExists: ((path: string) => boolean) | undefined;
  private readonly newId: () => string;

  constructor(
    private readonly spawner: SessionSpawner,
    options: SessionManagerOptions = {}
  ) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.maxLines = options.maxLines ?? MAX_BUFFERED_LINES;
    this.maxEnded = options.maxEndedSessions ?? MAX_ENDED_SESSIONS;
    this.keyExists = options.keyExists;
    this.newId = options.newId ?? (() => nanoid(10));
  }

  /**
   * Start a session. Resolves once the remote shell has echoed a readiness
   * marker written to its stdin, or with the client's error output if it
   * exits first. A client that stays silent past the timeout is killed.
   */
  connect(target: SshTarget): Promise<Result<SessionInfo, string>> {
    const id = this.newId();
    const session: Session = {
      id,
      target,
      handle: undefined,
      status: "connecting",
      startedAt: new Date().toISOString(),
      lines: [],
      partial: "",
      stderr: "",
      history: [],
      readyMarker: `${READY_PREFIX}${id}__`,
      onReady: undefined,
    };

    return new Promise((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (result: Result<SessionInfo, string>): void => {
        if (settled) return;
        settled = true;
        session.onReady = undefined;
        if (timer) clearTimeout(timer);
        resolve(result);
      };

      session.onReady = () => {
        session.status = "connected";
        settle(Ok(this.info(session)));
      };

      this.active.set(session.id, session);
      this.append(session, "stdout", `Connecting to ${targetLabel(target)}...\n`);

      session.handle = this.spawner.spawn("ssh", buildSshArgs(target, "session", this.keyExists), {
        onOutput: (stream, chunk) => this.append(session, stream, chunk),
        onExit: (code, signal) => {
          const failed = code !== 0 && (code === SSH_ERROR_EXIT || session.status === "connecting");
          this.finish(session, failed ? "failed" : "closed", code);
          console.error(
            `[ssh] Session ${session.id} (${targetLabel(target)}) exited with ${signal ?? `code ${code}`}`
          );
          settle(failed ? Err(connectFailure(target, code, session.stderr)) : Ok(this.info(session)));
        },
        onError: (message) => {
          this.append(session, "stderr", `${message}\n`);
          this.finish(session, "failed", null);
          settle(Err(message));
        },
      });

      session.handle.write(`echo ${session.readyMarker}\n`);

      timer = setTimeout(() => {
        if (settled) return;
        session.handle?.kill("SIGTERM");
        this.append(session, "stderr", "Timed out waiting for the remote shell\n");
        this.finish(session, "failed", null);
        settle(Err(`SSH connection to ${targetLabel(target)} timed out after ${this.connectTimeoutMs / 1000}s`));
      }, this.connectTimeoutMs);
    });
  }

  /**
   * Write a command line to the session and remember it in its history.
   */
  send(id: string, command: string): Result<SessionInfo, string> {
    const session = this.active.get(id);
    if (!session?.handle) return Err(`No active SSH session: ${id}`);

    const line = command.trim();
    if (!line) return Err("Command cannot be empty");

    if (!session.handle.write(`${line}\n`)) {
      return Err(`No active SSH session: ${id}`);
    }

    this.append(session, "stdout", `$ ${line}\n`);
    if (!session.history.includes(line)) session.history.push(line);
    return Ok(this.info(session));
  }

  /**
   * The last buffered lines of a session, open or ended.
   */
  read(id: string, lastLines = 50): Result<SessionOutput, string> {
    const session = this.find(id);
    if (!session) return Err(`Unknown SSH session: ${id}`);

    const all = session.partial ? [...session.lines, session.partial] : session.lines;
    return Ok({
      id,
      status: session.status,
      lines: lastLines > 0 ? all.slice(-lastLines) : [],
      total: all.length,
    });
  }

  /**
   * Empty a session's output buffer. Its history is kept.
   */
  clearOutput(id: string): Result<SessionInfo, string> {
    const session = this.find(id);
    if (!session) return Err(`Unknown SSH session: ${id}`);

    session.lines = [];
    session.partial = "";
    return Ok(this.info(session));
  }

  disconnect(id: string): Result<SessionInfo, string> {
    const session = this.active.get(id);
    if (!session) return Err(`No active SSH session: ${id}`);

    session.handle?.kill("SIGTERM");
    this.append(session, "stdout", "SSH connection terminated\n");
    this.finish(session, "closed", session.exitCode);
    return Ok(this.info(session));
  }

  list(): SessionInfo[] {
    return [...this.active.values()].map((s) => this.info(s));
  }

  history(id: string): Result<string[], string> {
    const session = this.find(id);
    if (!session) return Err(`Unknown SSH session: ${id}`);
    return Ok([...session.history]);
  }

  /**
   * Terminate every open session. Returns how many were stopped.
   */
  stopAll(): number {
    const ids = [...this.active.keys()];
    for (const id of ids) {
      this.disconnect(id);
    }
    return ids.length;
  }

  private find(id: string): Session | undefined {
    return this.active.get(id) ?? this.ended.get(id);
  }

  private finish(session: Session, status: SessionStatus, exitCode: number | null | undefined): void {
    if (!this.active.delete(session.id)) {
      // Already closed by disconnect; keep the late exit code
      session.exitCode = exitCode;
      return;
    }
    session.status = status;
    session.exitCode = exitCode;
    session.endedAt = new Date().toISOString();
    this.ended.set(session.id, session);

    for (const oldest of this.ended.keys()) {
      if (this.ended.size <= this.maxEnded) break;
      this.ended.delete(oldest);
    }
  }

  private append(session: Session, stream: OutputStream, chunk: string): void {
    const text = stripAnsi(chunk).replace(/\r/g, "");
    if (stream === "stderr") session.stderr += text;

    const parts = (session.partial + text).split("\n");
    session.partial = parts.pop() ?? "";
    for (const line of parts) {
      if (line.trim() === session.readyMarker) {
        session.onReady?.();
      } else {
        session.lines.push(line);
      }
    }

    if (session.lines.length > this.maxLines) {
      session.lines.splice(0, session.lines.length - this.maxLines);
    }
  }

  private info(session: Session): SessionInfo {
    return {
      id: session.id,
      target: targetLabel(session.target),
      pid: session.handle?.pid ?? null,
      status: session.status,
      startedAt: session.startedAt,
      ...(session.endedAt ? { endedAt: session.endedAt } : {}),
      ...(session.exitCode !== undefined ? { exitCode: session.exitCode } : {}),
      lines: session.lines.length + (session.partial ? 1 : 0),
    };
  }
}

function connectFailure(target: SshTarget, code: number | null, stderr: string): string {
  const detail = stderr.trim() || "no error output";
  return `SSH connection to ${targetLabel(target)} failed (exit ${code}): ${detail}`;
}
