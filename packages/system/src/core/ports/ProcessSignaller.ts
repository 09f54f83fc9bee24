import type { KillSignal, Result, SignalError } from "../model.js";

export interface ProcessSignaller {
  signal(pid: number, signal: KillSignal): Promise<Result<void, SignalError>>;
}
