import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { readText } from "@termdesk/core";
import type { SessionCallbacks, SessionHandle, SessionSpawner } from "../../core/ports/index.js";

class NodeSessionHandle implements SessionHandle {
  constructor(private readonly proc: ChildProcessWithoutNullStreams) {}

  get pid(): number | undefined {
    return this.proc.pid;
  }

  write(data: string): boolean {
    if (!this.proc.stdin.writable) return false;
    this.proc.stdin.write(data);
    return true;
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    if (!this.proc.pid) return false;
    return this.proc.kill(signal);
  }
}

export class NodeSessionSpawner implements SessionSpawner {
  spawn(command: string, args: string[], callbacks: SessionCallbacks): SessionHandle {
    const proc = spawn(command, args, { stdio: "pipe", windowsHide: true });

    readText(proc.stdout, (text) => callbacks.onOutput("stdout", text));
    readText(proc.stderr, (text) => callbacks.onOutput("stderr", text));

    // EPIPE after the client has gone away; the close event reports it
    proc.stdin.on("error", (error) => {
      callbacks.onOutput("stderr", `stdin: ${error.message}\n`);
    });

    // "close" waits for stdout and stderr to drain, unlike "exit"
    proc.on("close", (code, signal) => {
      callbacks.onExit(code, signal);
    });

    proc.on("error", (error: NodeJS.ErrnoException) => {
      callbacks.onError(error.code === "ENOENT" ? `Command not found: ${command}` : error.message);
    });

    return new NodeSessionHandle(proc);
  }
}
