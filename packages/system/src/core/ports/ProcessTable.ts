import type { ProcessRow, Result } from "../model.js";

/**
 * Read-only view of the OS process table.
 */
export interface ProcessTable {
  list(): Promise<Result<ProcessRow[], string>>;
}
