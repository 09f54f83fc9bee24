import type { SavedConnection, SessionInfo } from "../core/model.js";

export function formatConnection(c: SavedConnection): string {
  const key = c.keyFile ? `  key: ${c.keyFile}` : "";
  return `${c.name} (${c.id}): ${c.user}@${c.host}:${c.port}${key}`;
}

export function formatSession(s: SessionInfo): string {
  const exit = s.exitCode !== undefined ? ` exit ${s.exitCode}` : "";
  return `${s.id}  ${s.target}  ${s.status}${exit}  pid ${s.pid ?? "-"}  ${s.lines} lines`;
}
