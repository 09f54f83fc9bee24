import { describe, it, expect } from "vitest";
import { FakeCommandRunner, commandOutput } from "@termdesk/core";
import type { KillSignal } from "../src/core/model.js";
import { NodeProcessSignaller } from "../src/infrastructure/os/NodeProcessSignaller.js";
import { PsProcessTable } from "../src/infrastructure/os/PsProcessTable.js";
import { TaskkillSignaller } from "../src/infrastructure/os/TaskkillSignaller.js";

function errnoError(code: string): Error {
  return Object.assign(new Error(`kill ${code}`), { code });
}

describe("NodeProcessSignaller", () => {
  it("passes pid and signal to kill", async () => {
    const sent: Array<[number, KillSignal]> = [];
    const signaller = new NodeProcessSignaller((pid, signal) => {
      sent.push([pid, signal]);
    });

    expect(await signaller.signal(4242, "SIGKILL")).toEqual({ ok: true, value: undefined });
    expect(sent).toEqual([[4242, "SIGKILL"]]);
  });

  it.each(["ESRCH", "EPERM"] as const)("maps %s", async (code) => {
    const signaller = new NodeProcessSignaller(() => {
      throw errnoError(code);
    });

    expect(await signaller.signal(4242, "SIGTERM")).toEqual({
      ok: false,
      error: { code, message: `kill ${code}` },
    });
  });

  it("reports other errors as they are", async () => {
    const signaller = new NodeProcessSignaller(() => {
      throw errnoError("EINVAL");
    });

    expect(await signaller.signal(4242, "SIGTERM")).toEqual({
      ok: false,
      error: { code: "OTHER", message: "kill EINVAL" },
    });
  });
});

describe("TaskkillSignaller", () => {
  it("adds /F for SIGKILL", async () => {
    const runner = new FakeCommandRunner().on("taskkill", commandOutput("SUCCESS: Sent termination signal.\r\n"));
    const signaller = new TaskkillSignaller(runner);

    expect(await signaller.signal(5120, "SIGKILL")).toEqual({ ok: true, value: undefined });
    expect(await signaller.signal(5121, "SIGTERM")).toEqual({ ok: true, value: undefined });
    expect(runner.lines()).toEqual(["taskkill /PID 5120 /F", "taskkill /PID 5121"]);
  });

  it("maps a missing process to ESRCH", async () => {
    const message = 'ERROR: The process "5120" not found.';
    const runner = new FakeCommandRunner().on("taskkill", commandOutput("", 128, `${message}\r\n`));

    expect(await new TaskkillSignaller(runner).signal(5120, "SIGTERM")).toEqual({
      ok: false,
      error: { code: "ESRCH", message },
    });
  });

  it("maps access denied to EPERM", async () => {
    const message = 'ERROR: The process with PID 4 could not be terminated.\r\nReason: Access is denied.';
    const runner = new FakeCommandRunner().on("taskkill", commandOutput("", 1, message));

    expect(await new TaskkillSignaller(runner).signal(4, "SIGTERM")).toEqual({
      ok: false,
      error: { code: "EPERM", message },
    });
  });
});

describe("PsProcessTable", () => {
  it("runs tasklist on Windows", async () => {
    const runner = new FakeCommandRunner().on(
      "tasklist /fo csv /nh",
      commandOutput('"notepad.exe","5120","Console","1","14,320 K"\r\n')
    );

    const result = await new PsProcessTable(runner, "win32").list();

    expect(result).toEqual({
      ok: true,
      value: [{ pid: 5120, name: "notepad.exe", user: null, cpu: null, mem: "14,320 K", command: "notepad.exe" }],
    });
  });

  it("reports a missing ps binary", async () => {
    const result = await new PsProcessTable(new FakeCommandRunner(), "linux").list();
    expect(result).toEqual({ ok: false, error: "Command not found: ps" });
  });
});
