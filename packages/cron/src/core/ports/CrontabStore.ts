import type { Result } from "../model.js";

/**
 * Where the current user's crontab lives.
 */
export interface CrontabStore {
  /** Full crontab text, or null when the user has no crontab */
  read(): Promise<Result<string | null, string>>;
  /** Replace the whole crontab */
  write(text: string): Promise<Result<void, string>>;
  /** Remove the crontab entirely */
  clear(): Promise<Result<void, string>>;
}
