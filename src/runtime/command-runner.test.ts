import type { execFile, spawn } from "node:child_process";
import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";
import { ChildProcessRunner } from "./command-runner.js";
import { RuntimeCommandError } from "./types.js";

type ExecCallback = (err: (Error & { code?: number | string }) | null, stdout: string, stderr: string) => void;

function mockExecFile(err: (Error & { code?: number | string }) | null, stdout: string, stderr = "") {
  return vi.fn((_file: string, _args: string[], _opts: object, cb: ExecCallback) => {
    cb(err, stdout, stderr);
  });
}

function mockSpawn(code: number | null, signal: string | null = null) {
  return vi.fn(() => {
    const child = new EventEmitter();
    setImmediate(() => child.emit("close", code, signal));
    return child;
  });
}

describe("ChildProcessRunner", () => {
  it("captures stdout", async () => {
    const execFileFn = mockExecFile(null, "[]\n");
    const runner = new ChildProcessRunner(execFileFn as unknown as typeof execFile);

    expect(await runner.capture("lxc", ["list", "--format", "json"])).toBe("[]\n");
    expect(execFileFn).toHaveBeenCalledWith(
      "lxc",
      ["list", "--format", "json"],
      { encoding: "utf-8", maxBuffer: 16 * 1024 * 1024 },
      expect.any(Function),
    );
  });

  it("rejects with stderr and the exit code when the command fails", async () => {
    const failure = Object.assign(new Error("Command failed"), { code: 1 });
    const runner = new ChildProcessRunner(
      mockExecFile(failure, "", "Error: Instance not found\n") as unknown as typeof execFile,
    );

    const err = await runner.capture("lxc", ["start", "web"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RuntimeCommandError);
    expect(err).toMatchObject({ message: "lxc start web: Error: Instance not found", exitCode: 1 });
  });

  it("falls back to the error message when stderr is empty", async () => {
    const failure = Object.assign(new Error("spawn lxc ENOENT"), { code: "ENOENT" });
    const runner = new ChildProcessRunner(mockExecFile(failure, "") as unknown as typeof execFile);

    await expect(runner.capture("lxc", ["list"])).rejects.toMatchObject({
      message: "lxc list: spawn lxc ENOENT",
      exitCode: undefined,
    });
  });

  it("resolves run to the exit status", async () => {
    const spawnFn = mockSpawn(3);
    const runner = new ChildProcessRunner(undefined, spawnFn as unknown as typeof spawn);

    expect(await runner.run("lxc", ["exec", "web", "--", "false"])).toBe(3);
    expect(spawnFn).toHaveBeenCalledWith("lxc", ["exec", "web", "--", "false"], { stdio: "inherit" });
  });

  it("maps a signal to 128", async () => {
    const runner = new ChildProcessRunner(undefined, mockSpawn(null, "SIGINT") as unknown as typeof spawn);
    expect(await runner.run("lxc", ["exec", "web", "--", "sh"])).toBe(128);
  });
});
