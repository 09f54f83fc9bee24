import type { ProcessRow, SystemInfo } from "../core/model.js";

const GIB = 1024 ** 3;

export function formatProcessTable(rows: ProcessRow[]): string {
  const header = "PID       USER          CPU%   MEM     COMMAND";
  const body = rows.map(
    (r) =>
      `${String(r.pid).padEnd(9)} ${(r.user ?? "-").padEnd(13)} ${(r.cpu === null ? "-" : r.cpu.toFixed(1)).padEnd(6)} ${r.mem.padEnd(7)} ${r.command}`
  );
  return [header, ...body].join("\n");
}

function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return days > 0 ? `${days}d ${hours}h ${minutes}m` : `${hours}h ${minutes}m`;
}

export function formatSystemInfo(info: SystemInfo): string {
  const { memory } = info;
  const lines = [
    `Host: ${info.hostname}`,
    `OS: ${info.platform} ${info.release} (${info.arch})`,
    `Uptime: ${formatUptime(info.uptimeSeconds)}`,
    `Load: ${info.loadAverage.map((n) => n.toFixed(2)).join(" ")}`,
    `Memory: ${((memory.totalBytes - memory.freeBytes) / GIB).toFixed(1)} / ${(memory.totalBytes / GIB).toFixed(1)} GiB (${memory.usedPercent}%)`,
    "",
    "Disk:",
    info.disk,
    "",
    "Network:",
    ...info.network
      .filter((n) => !n.internal)
      .map((n) => `  ${n.interface} ${n.family} ${n.address}`),
  ];
  return lines.join("\n");
}
