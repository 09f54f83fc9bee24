import { describe, it, expect, beforeEach } from "vitest";
import { FakeCommandRunner, commandOutput } from "@termdesk/core";
import { CronService } from "../src/core/services/CronService.js";
import { InMemoryCrontab } from "../src/infrastructure/memory/InMemoryCrontab.js";

describe("CronService", () => {
  let runner: FakeCommandRunner;

  beforeEach(() => {
    runner = new FakeCommandRunner();
  });

  function serviceWith(text: string | null): { service: CronService; crontab: InMemoryCrontab } {
    const crontab = new InMemoryCrontab(text);
    return { service: new CronService(crontab, runner), crontab };
  }

  describe("list", () => {
    it("treats a missing crontab as no jobs", async () => {
      const { service } = serviceWith(null);
      expect(await service.list()).toEqual({ ok: true, value: [] });
    });
  });

  describe("add", () => {
    it("rejects an invalid schedule without writing anything", async () => {
      const { service, crontab } = serviceWith(null);

      const result = await service.add("61 * * * *", "/usr/bin/check-disk");

      expect(result).toEqual({ ok: false, error: "Invalid schedule: Minute must be 0-59" });
      expect(crontab.writes).toEqual([]);
      expect(await service.list()).toEqual({ ok: true, value: [] });
    });

    it("adds exactly one job for a valid schedule", async () => {
      const { service, crontab } = serviceWith(null);

      const result = await service.add("*/15 * * * *", "/usr/bin/check-disk");

      const entry = {
        index: 0,
        line: "*/15 * * * * /usr/bin/check-disk",
        schedule: "*/15 * * * *",
        command: "/usr/bin/check-disk",
        description: "Every 15 minutes",
      };
      expect(result).toEqual({ ok: true, value: entry });
      expect(crontab.writes).toEqual(["*/15 * * * * /usr/bin/check-disk\n"]);
      expect(await service.list()).toEqual({ ok: true, value: [entry] });
    });

    it("keeps environment lines and comments", async () => {
      const { service, crontab } = serviceWith("MAILTO=ops@example.com\n# nightly\n0 3 * * * /opt/backup.sh\n");

      await service.add("0 6 * * 1", "/opt/report.sh");

      expect(crontab.content).toBe(
        "MAILTO=ops@example.com\n# nightly\n0 3 * * * /opt/backup.sh\n0 6 * * 1 /opt/report.sh\n"
      );
    });

    it("requires a single-line command", async () => {
      const { service, crontab } = serviceWith(null);

      expect(await service.add("* * * * *", "   ")).toEqual({ ok: false, error: "Command cannot be empty" });
      expect(await service.add("* * * * *", "echo a\necho b")).toEqual({
        ok: false,
        error: "Command must be a single line",
      });
      expect(crontab.writes).toEqual([]);
    });

    it("returns crontab's complaint when installation fails", async () => {
      const { service, crontab } = serviceWith(null);
      crontab.rejectWrites("errors in crontab file, can't install.");

      expect(await service.add("0 1 * * *", "/opt/job.sh")).toEqual({
        ok: false,
        error: "errors in crontab file, can't install.",
      });
      expect(await service.list()).toEqual({ ok: true, value: [] });
    });
  });

  describe("update", () => {
    it("replaces one job in place", async () => {
      const { service, crontab } = serviceWith("# nightly\n0 3 * * * /opt/backup.sh\n0 4 * * * /opt/clean.sh\n");

      const result = await service.update(1, "30 4 * * *", "/opt/clean.sh --all");

      expect(result.ok && result.value.line).toBe("30 4 * * * /opt/clean.sh --all");
      expect(crontab.content).toBe("# nightly\n0 3 * * * /opt/backup.sh\n30 4 * * * /opt/clean.sh --all\n");
    });

    it("fails for an unknown index", async () => {
      const { service, crontab } = serviceWith("0 3 * * * /opt/backup.sh\n");

      expect(await service.update(5, "0 1 * * *", "/opt/x.sh")).toEqual({ ok: false, error: "Cron job not found: 5" });
      expect(crontab.writes).toEqual([]);
    });

    it("validates before looking up the job", async () => {
      const { service } = serviceWith("0 3 * * * /opt/backup.sh\n");
      expect(await service.update(0, "0 3 * * 9", "/opt/backup.sh")).toEqual({
        ok: false,
        error: "Invalid schedule: Weekday must be 0-6 (0=Sunday)",
      });
    });
  });

  describe("remove", () => {
    it("rewrites the crontab without the job", async () => {
      const { service, crontab } = serviceWith("# nightly\n0 3 * * * /opt/backup.sh\n");

      const result = await service.remove(0);

      expect(result.ok && result.value.command).toBe("/opt/backup.sh");
      expect(crontab.content).toBe("# nightly\n");
    });

    it("clears the crontab when the last line goes", async () => {
      const { service, crontab } = serviceWith("0 3 * * * /opt/backup.sh\n");

      await service.remove(0);

      expect(crontab.content).toBeNull();
      expect(crontab.writes).toEqual([]);
    });

    it("fails for an unknown index", async () => {
      const { service } = serviceWith(null);
      expect(await service.remove(0)).toEqual({ ok: false, error: "Cron job not found: 0" });
    });
  });

  describe("explain / describe", () => {
    it("explains a job field by field", async () => {
      const { service } = serviceWith("0 9 * * 1-5 /opt/standup.sh\n");

      const result = await service.explain(0);
      if (!result.ok) throw new Error(result.error);

      expect(result.value.entry.description).toBe("at 09:00 on weekday 1-5");
      expect(result.value.fields.map((f) => f.meaning)).toEqual([
        "minute 0",
        "hour 9",
        "every day of the month",
        "every month",
        "weekdays Monday through Friday",
      ]);
    });

    it("describes a schedule without installing it", () => {
      const { service, crontab } = serviceWith(null);

      expect(service.describe("*/30   * * * *")).toEqual({
        schedule: "*/30 * * * *",
        valid: true,
        description: "Every 30 minutes",
      });
      expect(service.describe("0 25 * * *")).toMatchObject({ valid: false, error: "Hour must be 0-23" });
      expect(crontab.writes).toEqual([]);
    });
  });

  describe("viewLogs", () => {
    it("keeps cron lines from the first readable log", async () => {
      runner.on(
        "tail -n 100 /var/log/cron.log",
        commandOutput("Oct 18 02:00:01 host CRON[123]: (root) CMD (backup)\nOct 18 02:00:02 host sshd[1]: accepted\n")
      );
      const { service } = serviceWith(null);

      expect(await service.viewLogs()).toEqual({
        ok: true,
        value: {
          source: "/var/log/cron.log",
          filtered: true,
          text: "Oct 18 02:00:01 host CRON[123]: (root) CMD (backup)",
        },
      });
      expect(runner.lines()).toEqual(["tail -n 100 /var/log/cron", "tail -n 100 /var/log/cron.log"]);
    });

    it("returns the raw tail when nothing mentions cron", async () => {
      runner
        .on("tail -n 100 /var/log/cron", commandOutput("", 1, "tail: cannot open '/var/log/cron'"))
        .on("tail -n 100 /var/log/syslog", commandOutput("kernel: eth0 up\n"));
      const { service } = serviceWith(null);

      expect(await service.viewLogs()).toEqual({
        ok: true,
        value: { source: "/var/log/syslog", filtered: false, text: "kernel: eth0 up\n" },
      });
    });

    it("narrows cron lines to a search", async () => {
      runner.on(
        "tail -n 100 /var/log/cron",
        commandOutput("CRON[12]: (root) CMD (backup.sh)\nCRON[13]: (ops) CMD (rotate-logs)\n")
      );
      const { service } = serviceWith(null);

      expect(await service.viewLogs("Backup")).toEqual({
        ok: true,
        value: { source: "/var/log/cron", filtered: true, search: "Backup", text: "CRON[12]: (root) CMD (backup.sh)" },
      });
    });

    it("falls back to the journal", async () => {
      runner.on("journalctl", commandOutput("-- No entries --\n"));
      const { service } = serviceWith(null);

      const result = await service.viewLogs();

      expect(result).toEqual({
        ok: true,
        value: { source: "journalctl -u cron", filtered: true, text: "-- No entries --\n" },
      });
      expect(runner.lines()[3]).toBe("journalctl -u cron -n 50 --no-pager");
    });

    it("lists every place it looked when nothing is readable", async () => {
      const { service } = serviceWith(null);
      expect(await service.viewLogs()).toEqual({
        ok: false,
        error: "No cron logs found (tried: /var/log/cron, /var/log/cron.log, /var/log/syslog, journalctl -u cron)",
      });
    });
  });
});
