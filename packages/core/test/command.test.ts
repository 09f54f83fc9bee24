import { describe, it, expect, vi } from "vitest";
import { PassThrough } from "node:stream";
import { readText, stopProcess } from "../src/command.js";

describe("readText", () => {
  it("keeps a character split across chunks whole", async () => {
    const stream = new PassThrough();
    const chunks: string[] = [];
    readText(stream, (text) => chunks.push(text));

    const bytes = Buffer.from("größe", "utf8");
    // "ö" is two bytes; cut between them
    stream.write(bytes.subarray(0, 3));
    stream.end(bytes.subarray(3));
    await new Promise((resolve) => stream.on("end", resolve));

    expect(chunks.join("")).toBe("größe");
  });

  it("ignores a missing stream", () => {
    const onText = vi.fn();
    readText(null, onText);
    expect(onText).not.toHaveBeenCalled();
  });
});

describe("stopProcess", () => {
  function fakeProcess(pid: number | undefined) {
    return { pid, kill: vi.fn((_signal?: NodeJS.Signals) => true) };
  }

  it("signals the whole process group", () => {
    const proc = fakeProcess(4321);
    const killGroup = vi.fn();

    stopProcess(proc, true, killGroup);

    expect(killGroup).toHaveBeenCalledWith(-4321, "SIGTERM");
    expect(proc.kill).not.toHaveBeenCalled();
  });

  it("falls back to the process when the group is gone", () => {
    const proc = fakeProcess(4321);
    const killGroup = vi.fn(() => {
      throw Object.assign(new Error("kill ESRCH"), { code: "ESRCH" });
    });
    const log = vi.spyOn(console, "error").mockImplementation(() => {});

    stopProcess(proc, true, killGroup);

    expect(proc.kill).toHaveBeenCalledWith("SIGTERM");
    expect(log).toHaveBeenCalledWith("[core] Could not signal process group 4321: kill ESRCH");
    log.mockRestore();
  });

  it("signals only the process when it has no group", () => {
    const proc = fakeProcess(4321);
    const killGroup = vi.fn();

    stopProcess(proc, false, killGroup, "SIGKILL");

    expect(killGroup).not.toHaveBeenCalled();
    expect(proc.kill).toHaveBeenCalledWith("SIGKILL");
  });
});
