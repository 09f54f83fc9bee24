/**
 * Host overview and system log access.
 */

import * as os from "node:os";
import { searchLines, type CommandRunner, type Platform } from "@termdesk/core";
import { Err, Ok, type NetworkAddress, type Result, type SystemInfo, type SystemLogs } from "../model.js";

export const SYSTEM_LOG_FILES = ["/var/log/syslog", "/var/log/messages", "/var/log/kern.log", "/var/log/dmesg"];
const LOG_TAIL_LINES = 200;
const JOURNAL_LINES = 100;
const EVENT_LOG_ENTRIES = 50;

export const NO_LOGS_MESSAGE = "No accessible system logs found or insufficient permissions";

/**
 * The parts of node:os the overview reads.
 */
export type OsSource = Pick<
  typeof os,
  "hostname" | "platform" | "release" | "arch" | "uptime" | "loadavg" | "totalmem" | "freemem" | "networkInterfaces"
>;

export class SystemService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly platform: Platform,
    private readonly osSource: OsSource = os
  ) {}

  async systemInfo(): Promise<SystemInfo> {
    const total = this.osSource.totalmem();
    const free = this.osSource.freemem();

    return {
      hostname: this.osSource.hostname(),
      platform: this.osSource.platform(),
      release: this.osSource.release(),
      arch: this.osSource.arch(),
      uptimeSeconds: Math.round(this.osSource.uptime()),
      loadAverage: this.osSource.loadavg(),
      memory: {
        totalBytes: total,
        freeBytes: free,
        usedPercent: total > 0 ? Math.round(((total - free) / total) * 1000) / 10 : 0,
      },
      disk: await this.diskUsage(),
      network: this.networkAddresses(),
    };
  }

  /**
   * Recent entries from the first readable system log, narrowed to lines
   * containing `search` when one is given.
   */
  async systemLogs(search?: string): Promise<Result<SystemLogs, string>> {
    const logs = await this.readLogs();
    if (!logs.ok || !search?.trim()) return logs;
    return Ok({ ...logs.value, search: search.trim(), text: searchLines(logs.value.text, search) });
  }

  private async readLogs(): Promise<Result<SystemLogs, string>> {
    if (this.platform === "win32") {
      const events = await this.runner.run("wevtutil", ["qe", "System", "/f:text", `/c:${EVENT_LOG_ENTRIES}`, "/rd:true"]);
      if (events.ok && events.value.exitCode === 0) {
        return Ok({ source: "wevtutil System", text: events.value.stdout });
      }
      return Err(NO_LOGS_MESSAGE);
    }

    for (const file of SYSTEM_LOG_FILES) {
      const tail = await this.runner.run("tail", ["-n", String(LOG_TAIL_LINES), file]);
      if (tail.ok && tail.value.exitCode === 0 && tail.value.stdout.trim() !== "") {
        return Ok({ source: file, text: tail.value.stdout });
      }
    }

    const journal = await this.runner.run("journalctl", ["-n", String(JOURNAL_LINES), "--no-pager"]);
    if (journal.ok && journal.value.exitCode === 0) {
      return Ok({ source: "journalctl", text: journal.value.stdout });
    }

    return Err(NO_LOGS_MESSAGE);
  }

  private async diskUsage(): Promise<string> {
    const windows = this.platform === "win32";
    const command = windows ? "wmic" : "df";
    const args = windows ? ["logicaldisk", "get", "caption,freespace,size"] : ["-h"];

    const result = await this.runner.run(command, args);
    if (!result.ok) return `unavailable: ${result.error.message}`;
    if (result.value.exitCode !== 0) {
      return `unavailable: ${result.value.stderr.trim() || `${command} exited with code ${result.value.exitCode}`}`;
    }
    return result.value.stdout.trimEnd();
  }

  private networkAddresses(): NetworkAddress[] {
    const addresses: NetworkAddress[] = [];
    for (const [name, entries] of Object.entries(this.osSource.networkInterfaces())) {
      for (const entry of entries ?? []) {
        addresses.push({ interface: name, family: entry.family, address: entry.address, internal: entry.internal });
      }
    }
    return addresses;
  }
}
