import { describe, it, expect } from "vitest";
import { FakeCommandRunner, commandOutput } from "@termdesk/core";
import { CrontabCli } from "../src/infrastructure/cli/CrontabCli.js";

describe("CrontabCli", () => {
  it("reads the crontab with crontab -l", async () => {
    const runner = new FakeCommandRunner().on("crontab -l", commandOutput("0 1 * * * /opt/a.sh\n"));
    expect(await new CrontabCli(runner).read()).toEqual({ ok: true, value: "0 1 * * * /opt/a.sh\n" });
  });

  it("treats 'no crontab for' as an empty crontab", async () => {
    const runner = new FakeCommandRunner().on("crontab -l", commandOutput("", 1, "no crontab for ops\n"));
    expect(await new CrontabCli(runner).read()).toEqual({ ok: true, value: null });
  });

  it("passes other failures through verbatim", async () => {
    const runner = new FakeCommandRunner().on(
      "crontab -l",
      commandOutput("", 1, "crontab: your UID isn't in the passwd file.\n")
    );
    expect(await new CrontabCli(runner).read()).toEqual({
      ok: false,
      error: "crontab: your UID isn't in the passwd file.",
    });
  });

  it("reports a missing crontab binary", async () => {
    expect(await new CrontabCli(new FakeCommandRunner()).read()).toEqual({
      ok: false,
      error: "Command not found: crontab",
    });
  });

  it("installs through stdin", async () => {
    const runner = new FakeCommandRunner().on("crontab -", commandOutput(""));

    expect(await new CrontabCli(runner).write("0 1 * * * /opt/a.sh\n")).toEqual({ ok: true, value: undefined });
    expect(runner.calls[0].args).toEqual(["-"]);
    expect(runner.calls[0].options?.input).toBe("0 1 * * * /opt/a.sh\n");
  });

  it("falls back to the exit code when crontab prints nothing", async () => {
    const runner = new FakeCommandRunner().on("crontab -", commandOutput("", 1));
    expect(await new CrontabCli(runner).write("bad\n")).toEqual({
      ok: false,
      error: "crontab - exited with code 1",
    });
  });

  it("clearing an absent crontab succeeds", async () => {
    const runner = new FakeCommandRunner().on("crontab -r", commandOutput("", 1, "no crontab for ops\n"));
    expect(await new CrontabCli(runner).clear()).toEqual({ ok: true, value: undefined });
  });
});
