/**
 * In-memory CrontabStore for tests.
 */

import type { CrontabStore } from "../../core/ports/index.js";
import { Err, Ok, type Result } from "../../core/model.js";

export class InMemoryCrontab implements CrontabStore {
  /** Every text passed to write, in order */
  readonly writes: string[] = [];
  private rejectWith: string | undefined;

  constructor(private text: string | null = null) {}

  /** Make the next writes fail the way `crontab` does on a bad file. */
  rejectWrites(message: string): void {
    this.rejectWith = message;
  }

  get content(): string | null {
    return this.text;
  }

  async read(): Promise<Result<string | null, string>> {
    return Ok(this.text);
  }

  async write(text: string): Promise<Result<void, string>> {
    if (this.rejectWith !== undefined) return Err(this.rejectWith);
    this.writes.push(text);
    this.text = text;
    return Ok(undefined);
  }

  async clear(): Promise<Result<void, string>> {
    this.text = null;
    return Ok(undefined);
  }
}
