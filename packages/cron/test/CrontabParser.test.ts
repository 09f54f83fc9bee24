import { describe, it, expect } from "vitest";
import { findJob, parseCrontab, renderCrontab, toEntries } from "../src/core/CrontabParser.js";

const CRONTAB = [
  "SHELL=/bin/bash",
  "# backups",
  "0 2 * * * /usr/local/bin/backup.sh --full",
  "",
  "@reboot /opt/start.sh",
  "broken line",
  "*/5  *  * * *   echo  hi",
  "",
].join("\n");

describe("parseCrontab", () => {
  it("separates jobs from everything else", () => {
    const { lines, skipped } = parseCrontab(CRONTAB);

    expect(lines.map((l) => l.kind)).toEqual(["other", "other", "job", "other", "other", "other", "job"]);
    expect(skipped).toEqual(["broken line"]);
  });

  it("normalizes the schedule but keeps the command as written", () => {
    const { lines } = parseCrontab(CRONTAB);
    expect(lines[6]).toEqual({
      kind: "job",
      line: "*/5  *  * * *   echo  hi",
      schedule: "*/5 * * * *",
      command: "echo  hi",
    });
  });

  it("renders back to the same text", () => {
    expect(renderCrontab(parseCrontab(CRONTAB).lines)).toBe(CRONTAB);
  });

  it("treats an empty crontab as no lines", () => {
    expect(parseCrontab("")).toEqual({ lines: [], skipped: [] });
    expect(renderCrontab([])).toBe("");
  });
});

describe("toEntries", () => {
  it("numbers jobs in file order and describes them", () => {
    const entries = toEntries(parseCrontab(CRONTAB).lines);

    expect(entries).toEqual([
      {
        index: 0,
        line: "0 2 * * * /usr/local/bin/backup.sh --full",
        schedule: "0 2 * * *",
        command: "/usr/local/bin/backup.sh --full",
        description: "at 02:00",
      },
      {
        index: 1,
        line: "*/5  *  * * *   echo  hi",
        schedule: "*/5 * * * *",
        command: "echo  hi",
        description: "Every 5 minutes",
      },
    ]);
  });

  it("findJob maps entry indexes to line positions", () => {
    const { lines } = parseCrontab(CRONTAB);
    expect(findJob(lines, 0)).toBe(2);
    expect(findJob(lines, 1)).toBe(6);
    expect(findJob(lines, 2)).toBe(-1);
  });
});
