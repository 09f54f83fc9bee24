/**
 * In-process SessionSpawner: nothing is started, tests drive output and exits.
 */

import type { OutputStream, SessionCallbacks, SessionHandle, SessionSpawner } from "../src/core/ports/index.js";

const READY_ECHO = /^echo (__termdesk_ready_\S+__)\n$/;

export class FakeSession implements SessionHandle {
  readonly pid = 777;
  /** Commands written after the readiness echo */
  readonly written: string[] = [];
  readonly killed: NodeJS.Signals[] = [];
  private open = true;

  constructor(
    readonly command: string,
    readonly args: string[],
    private readonly callbacks: SessionCallbacks,
    /** Answer the readiness echo like a logged-in remote shell */
    private readonly answerReady: boolean
  ) {}

  write(data: string): boolean {
    if (!this.open) return false;

    const ready = READY_ECHO.exec(data);
    if (ready) {
      const marker = ready[1];
      if (this.answerReady) {
        queueMicrotask(() => {
          if (this.open) this.output(`${marker}\n`);
        });
      }
      return true;
    }

    this.written.push(data);
    return true;
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.killed.push(signal);
    queueMicrotask(() => this.exit(null, signal));
    return true;
  }

  output(chunk: string, stream: OutputStream = "stdout"): void {
    this.callbacks.onOutput(stream, chunk);
  }

  exit(code: number | null, signal: string | null = null): void {
    if (!this.open) return;
    this.open = false;
    this.callbacks.onExit(code, signal);
  }

  fail(message: string): void {
    this.open = false;
    this.callbacks.onError(message);
  }
}

export class FakeSessionSpawner implements SessionSpawner {
  readonly spawned: FakeSession[] = [];
  /** Runs on the next microtask after each spawn, like a real child's first events */
  onSpawn: ((session: FakeSession) => void) | undefined;
  /** When false, sessions never log in: the readiness echo goes unanswered */
  answerReady = true;

  spawn(command: string, args: string[], callbacks: SessionCallbacks): SessionHandle {
    const session = new FakeSession(command, args, callbacks, this.answerReady);
    this.spawned.push(session);
    const hook = this.onSpawn;
    if (hook) queueMicrotask(() => hook(session));
    return session;
  }

  get last(): FakeSession {
    return this.spawned[this.spawned.length - 1];
  }
}
