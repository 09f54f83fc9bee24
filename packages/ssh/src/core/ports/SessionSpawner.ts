export type OutputStream = "stdout" | "stderr";

export interface SessionHandle {
  readonly pid: number | undefined;
  /** False when stdin is no longer writable */
  write(data: string): boolean;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface SessionCallbacks {
  onOutput: (stream: OutputStream, chunk: string) => void;
  onExit: (code: number | null, signal: string | null) => void;
  /** The process could not be started */
  onError: (message: string) => void;
}

/**
 * Starts long-lived client processes with piped stdio.
 */
export interface SessionSpawner {
  spawn(command: string, args: string[], callbacks: SessionCallbacks): SessionHandle;
}
