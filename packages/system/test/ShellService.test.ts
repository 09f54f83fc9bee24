import { describe, it, expect, beforeEach } from "vitest";
import { FakeCommandRunner, commandOutput } from "@termdesk/core";
import { ShellService } from "../src/core/services/ShellService.js";

const HOME = "/home/tester";
const DIRECTORIES = new Set([HOME, `${HOME}/projects`, "/tmp"]);

describe("ShellService", () => {
  let runner: FakeCommandRunner;
  let shell: ShellService;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    shell = new ShellService(runner, {
      cwd: HOME,
      home: HOME,
      isDirectory: async (path) => DIRECTORIES.has(path),
    });
  });

  it("runs a command through the shell in the working directory", async () => {
    runner.on("ls -a", commandOutput(".\n..\nnotes.txt\n"));

    const result = await shell.run("  ls -a ");

    expect(result).toEqual({
      ok: true,
      value: { command: "ls -a", cwd: HOME, output: ".\n..\nnotes.txt\n", exitCode: 0, builtin: false },
    });
    expect(runner.calls[0].options).toEqual({ shell: true, cwd: HOME, timeoutMs: 60000 });
  });

  it("appends the exit code when a command fails", async () => {
    runner.on("cat missing.txt", commandOutput("", 1, "cat: missing.txt: No such file or directory\n"));

    const result = await shell.run("cat missing.txt");

    expect(result.ok && result.value.output).toBe(
      "cat: missing.txt: No such file or directory\nCommand exited with code 1"
    );
  });

  it("reports the exit code of a silent failure", async () => {
    runner.on("false", commandOutput("", 1));

    const result = await shell.run("false");

    expect(result.ok && result.value.output).toBe("Command exited with code 1");
  });

  it("reports a timeout", async () => {
    runner.on("sleep 600", { kind: "timeout", message: "sleep 600 timed out after 60000ms" });
    expect(await shell.run("sleep 600")).toEqual({ ok: false, error: "Command timed out after 60s" });
  });

  it("rejects an empty command", async () => {
    expect(await shell.run("   ")).toEqual({ ok: false, error: "Command cannot be empty" });
    expect(runner.calls).toEqual([]);
  });

  describe("cd", () => {
    it("resolves relative paths and later commands run there", async () => {
      runner.on("ls", commandOutput("README.md\n"));

      const cd = await shell.run("cd projects");
      await shell.run("ls");

      expect(cd).toEqual({
        ok: true,
        value: { command: "cd projects", cwd: `${HOME}/projects`, output: `${HOME}/projects`, exitCode: 0, builtin: true },
      });
      expect(shell.cwd()).toBe(`${HOME}/projects`);
      expect(runner.calls[0].options?.cwd).toBe(`${HOME}/projects`);
    });

    it("goes home with no argument or ~", async () => {
      await shell.run("cd /tmp");
      expect(shell.cwd()).toBe("/tmp");

      await shell.run("cd");
      expect(shell.cwd()).toBe(HOME);

      await shell.run("cd /tmp");
      await shell.run("cd ~");
      expect(shell.cwd()).toBe(HOME);
    });

    it("keeps the directory when the target does not exist", async () => {
      const result = await shell.run("cd /nope");

      expect(result).toEqual({ ok: false, error: "cd: no such directory: /nope" });
      expect(shell.cwd()).toBe(HOME);
    });
  });

  it("answers pwd without running anything", async () => {
    const result = await shell.run("pwd");

    expect(result.ok && result.value.output).toBe(HOME);
    expect(runner.calls).toEqual([]);
  });

  it("only notes exit and quit", async () => {
    const result = await shell.run("exit");

    expect(result.ok && result.value.builtin).toBe(true);
    expect(shell.cwd()).toBe(HOME);
    expect(runner.calls).toEqual([]);
  });

  describe("history", () => {
    it("records commands once, in order", async () => {
      runner.on("uptime", commandOutput("up 3 days\n"));

      await shell.run("uptime");
      await shell.run("pwd");
      await shell.run("uptime");

      expect(shell.history()).toEqual(["uptime", "pwd"]);
    });

    it("is emptied by clear", async () => {
      await shell.run("pwd");
      await shell.run("clear");

      expect(shell.history()).toEqual([]);
    });
  });
});
