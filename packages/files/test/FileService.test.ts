import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FakeCommandRunner, InMemorySettingsStore, JsonSettingsStore, commandOutput } from "@termdesk/core";
import { FileService, openerCommand } from "../src/core/FileService.js";

describe("FileService", () => {
  let dir: string;
  let runner: FakeCommandRunner;
  let settings: InMemorySettingsStore;
  let service: FileService;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "termdesk-files-"));
    runner = new FakeCommandRunner();
    settings = new InMemorySettingsStore();
    service = new FileService(runner, settings, { platform: "linux" });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function touch(name: string, content = ""): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  describe("openPath", () => {
    it("reports a missing path without running the opener", async () => {
      const missing = join(dir, "missing.txt");
      const result = await service.openPath(missing);

      expect(result).toEqual({ ok: false, error: `Path not found: ${missing}` });
      expect(runner.calls).toHaveLength(0);
    });

    it("hands an existing file to xdg-open", async () => {
      const file = touch("notes.txt", "hello");
      runner.on("xdg-open", commandOutput(""));

      const result = await service.openPath(file);

      expect(result).toEqual({ ok: true, value: { path: file, kind: "file", opener: "xdg-open" } });
      expect(runner.lines()).toEqual([`xdg-open ${file}`]);
      expect(settings.load().recentFiles).toEqual([file]);
    });

    it("opens folders without adding them to recent files", async () => {
      runner.on("xdg-open", commandOutput(""));

      const result = await service.openPath(dir);

      expect(result.ok && result.value.kind).toBe("folder");
      expect(settings.load().recentFiles).toEqual([]);
    });

    it("reports the kind seen before opening when the opener removes the path", async () => {
      const file = touch("download.part", "partial");
      runner.on("xdg-open", () => {
        rmSync(file);
        return commandOutput("");
      });

      const result = await service.openPath(file);

      expect(result).toEqual({ ok: true, value: { path: file, kind: "file", opener: "xdg-open" } });
    });

    it("surfaces a missing file association", async () => {
      const file = touch("archive.xyz");
      runner.on("xdg-open", commandOutput("", 3, "xdg-open: no method available for opening 'archive.xyz'\n"));

      const result = await service.openPath(file);

      expect(result).toEqual({
        ok: false,
        error: `No application associated with ${file}: xdg-open: no method available for opening 'archive.xyz'`,
      });
    });

    it("reports a missing opener binary", async () => {
      const file = touch("notes.txt");
      const result = await service.openPath(file);
      expect(result).toEqual({ ok: false, error: "Opener not available: xdg-open" });
    });
  });

  describe("openerCommand", () => {
    it("uses start with an empty title on windows", () => {
      expect(openerCommand("win32", "C:\\logs")).toEqual({ command: "cmd", args: ["/c", "start", "", "C:\\logs"] });
    });

    it("uses open on macOS", () => {
      expect(openerCommand("darwin", "/Users/ops")).toEqual({ command: "open", args: ["/Users/ops"] });
    });
  });

  describe("readFile / writeFile", () => {
    it("reads content with size and line count", async () => {
      const file = touch("crontab.bak", "line one\nline two");
      const result = await service.readFile(file);

      expect(result).toEqual({
        ok: true,
        value: { path: file, content: "line one\nline two", size: 17, lines: 2 },
      });
      expect(settings.load().recentFiles).toEqual([file]);
    });

    it("refuses to read a directory", async () => {
      const result = await service.readFile(dir);
      expect(result).toEqual({ ok: false, error: `Not a file: ${dir}` });
    });

    it("creates a new file", async () => {
      const file = join(dir, "new.sh");
      const result = await service.writeFile(file, "echo hi\n");

      expect(result).toEqual({ ok: true, value: { path: file, bytes: 8, created: true } });
      expect(readFileSync(file, "utf-8")).toBe("echo hi\n");
    });

    it("overwrites an existing file", async () => {
      const file = touch("app.conf", "old");
      const result = await service.writeFile(file, "new");

      expect(result).toEqual({ ok: true, value: { path: file, bytes: 3, created: false } });
      expect(readFileSync(file, "utf-8")).toBe("new");
    });

    it("requires the parent directory to exist", async () => {
      const result = await service.writeFile(join(dir, "nope", "file.txt"), "x");
      expect(result).toEqual({ ok: false, error: `Directory not found: ${join(dir, "nope")}` });
    });
  });

  describe("recent files", () => {
    it("keeps the ten most recent, newest first, without duplicates", async () => {
      const paths: string[] = [];
      for (let i = 0; i < 12; i++) {
        paths.push(touch(`f${i}.txt`, `${i}`));
      }
      for (const path of paths) {
        await service.readFile(path);
      }
      await service.readFile(paths[5]);

      const recent = settings.load().recentFiles;
      expect(recent).toHaveLength(10);
      expect(recent[0]).toBe(paths[5]);
      expect(recent[1]).toBe(paths[11]);
      expect(recent.filter((p) => p === paths[5])).toHaveLength(1);
      expect(recent).not.toContain(paths[0]);
    });

    it("hides files that no longer exist", async () => {
      const kept = touch("kept.txt");
      const gone = touch("gone.txt");
      await service.readFile(kept);
      await service.readFile(gone);
      rmSync(gone);

      expect(service.listRecent()).toEqual([{ path: kept, name: "kept.txt" }]);
    });

    it("forgets a single entry", async () => {
      const a = touch("a.txt");
      const b = touch("b.txt");
      await service.readFile(a);
      await service.readFile(b);

      expect(service.forgetRecent(a)).toEqual({ ok: true, value: [b] });
      expect(service.forgetRecent(a)).toEqual({ ok: false, error: `Not in recent files: ${a}` });
    });
  });

  describe("openInEditor", () => {
    it("opens the preferred editor in the first available terminal", async () => {
      const file = touch("hosts");
      runner.allowLaunch("xterm");

      const result = await service.openInEditor(file);

      expect(result).toEqual({ ok: true, value: { path: file, editor: "nano", launcher: "xterm" } });
      expect(runner.lines("launch")).toEqual([`gnome-terminal -- nano ${file}`, `xterm -e nano ${file}`]);
    });

    it("remembers an explicitly chosen editor", async () => {
      const file = touch("hosts");
      runner.allowLaunch("gnome-terminal");

      await service.openInEditor(file, "vim");

      expect(service.preferredEditor()).toBe("vim");
    });

    it("starts the editor directly when no terminal is available", async () => {
      const file = touch("hosts");
      runner.allowLaunch("gvim");

      const result = await service.openInEditor(file, "gvim");

      expect(result).toEqual({ ok: true, value: { path: file, editor: "gvim", launcher: "gvim" } });
    });

    it("fails when neither a terminal nor the editor starts", async () => {
      const file = touch("hosts");
      const result = await service.openInEditor(file);
      expect(result).toEqual({ ok: false, error: "Could not find a terminal emulator or nano" });
    });

    it("checks the path before launching anything", async () => {
      const result = await service.openInEditor(join(dir, "nope"));
      expect(result.ok).toBe(false);
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe("with settings that cannot be saved", () => {
    let broken: FileService;

    beforeEach(() => {
      const plainFile = join(dir, "not-a-dir");
      writeFileSync(plainFile, "");
      broken = new FileService(runner, new JsonSettingsStore(join(plainFile, "termdesk")), { platform: "linux" });
    });

    it("still reads the file", async () => {
      const file = touch("motd.txt", "welcome\n");

      const result = await broken.readFile(file);

      expect(result).toEqual({ ok: true, value: { path: file, content: "welcome\n", size: 8, lines: 2 } });
    });

    it("still reports an opened file", async () => {
      const file = touch("notes.txt");
      runner.on("xdg-open", commandOutput(""));

      const result = await broken.openPath(file);

      expect(result).toEqual({ ok: true, value: { path: file, kind: "file", opener: "xdg-open" } });
    });

    it("reports a new editor preference that was not saved", async () => {
      const file = touch("notes.txt");
      runner.allowLaunch("gnome-terminal");

      const result = await broken.openInEditor(file, "vim");

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.startsWith("Could not save settings to ")).toBe(true);
      expect(runner.calls).toEqual([]);
    });
  });

  it("uses a preferred terminal from options first", async () => {
    const file = touch("hosts");
    const custom = new FileService(runner.allowLaunch("kitty"), settings, { platform: "linux", terminal: "kitty" });

    const result = await custom.openInEditor(file);

    expect(result.ok && result.value.launcher).toBe("kitty");
    expect(runner.lines("launch")).toEqual([`kitty -e nano ${file}`]);
  });
});
