import { execFile as defaultExecFile, spawn as defaultSpawn } from "node:child_process";
import { RuntimeCommandError } from "./types.js";

/** Runs host commands. The runtime and NAT adapters only talk to the host through this. */
export interface CommandRunner {
  /** Run to completion and return stdout; rejects when the command exits non-zero. */
  capture(file: string, args: readonly string[]): Promise<string>;
  /** Run with the caller's stdio attached and resolve to the exit status. */
  run(file: string, args: readonly string[]): Promise<number>;
}

const CAPTURE_MAX_BUFFER = 16 * 1024 * 1024;

export class ChildProcessRunner implements CommandRunner {
  constructor(
    private readonly execFileFn: typeof defaultExecFile = defaultExecFile,
    private readonly spawnFn: typeof defaultSpawn = defaultSpawn,
  ) {}

  capture(file: string, args: readonly string[]): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      this.execFileFn(
        file,
        [...args],
        { encoding: "utf-8", maxBuffer: CAPTURE_MAX_BUFFER },
        (err, stdout, stderr) => {
          if (err) {
            const code = typeof err.code === "number" ? err.code : undefined;
            reject(new RuntimeCommandError(`${file} ${args.join(" ")}: ${stderr.trim() || err.message}`, code));
          } else {
            resolve(stdout);
          }
        },
      );
    });
  }

  run(file: string, args: readonly string[]): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const child = this.spawnFn(file, [...args], { stdio: "inherit" });
      child.on("error", (err) => reject(new RuntimeCommandError(`${file}: ${err.message}`)));
      child.on("close", (code, signal) => {
        resolve(code ?? (signal ? 128 : 1));
      });
    });
  }
}
