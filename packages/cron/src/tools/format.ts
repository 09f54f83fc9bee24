import type { CronEntry } from "../core/model.js";

export function formatEntry(entry: CronEntry): string {
  return `[${entry.index}] ${entry.schedule}  ${entry.command}\n    ${entry.description}`;
}
