import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { ChildProcessRunner, type CommandRunner } from "./command-runner.js";
import {
  type ContainerRuntime,
  type ExecOptions,
  type LaunchRequest,
  RuntimeCommandError,
  type RuntimeState,
} from "./types.js";

const LXC = "lxc";

/** The slice of `lxc list --format json` the runtime reads. */
const lxcInstanceSchema = z.object({
  name: z.string(),
  status: z.string(),
  state: z
    .object({
      network: z
        .record(
          z.object({
            addresses: z.array(z.object({ family: z.string(), address: z.string() })).default([]),
          }),
        )
        .nullish(),
    })
    .nullish(),
});

type LxcInstance = z.infer<typeof lxcInstanceSchema>;

/**
 * LXD through the `lxc` command line client. Output is inherited for
 * launch and exec so the operator sees what the instance prints.
 */
export class LxdRuntime implements ContainerRuntime {
  constructor(private readonly runner: CommandRunner = new ChildProcessRunner()) {}

  async exists(id: string): Promise<boolean> {
    return (await this.find(id)) !== null;
  }

  async state(id: string): Promise<RuntimeState> {
    const instance = await this.find(id);
    if (!instance) return "absent";
    return instance.status === "Running" ? "running" : "stopped";
  }

  async launch(request: LaunchRequest): Promise<boolean> {
    const status = await this.runner.run(LXC, ["launch", request.box, request.id, "-v"]);
    if (status !== 0) return false;

    for (const mp of request.mountpoints) {
      logger.debug(`Attaching ${mp.source} to ${request.id}:${mp.path}`, { device: mp.name });
      await this.runner.capture(LXC, [
        "config",
        "device",
        "add",
        request.id,
        mp.name,
        "disk",
        `source=${mp.source}`,
        `path=${mp.path}`,
      ]);
    }
    return true;
  }

  async start(id: string): Promise<void> {
    await this.runner.capture(LXC, ["start", id]);
  }

  async stop(id: string): Promise<void> {
    await this.runner.capture(LXC, ["stop", id]);
  }

  async remove(id: string): Promise<void> {
    await this.runner.capture(LXC, ["delete", id, "-f"]);
  }

  async addresses(id: string): Promise<Record<string, string>> {
    const instance = await this.find(id);
    if (!instance) throw new RuntimeCommandError(`Instance ${id} does not exist`);

    const result: Record<string, string> = {};
    for (const [device, info] of Object.entries(instance.state?.network ?? {})) {
      const inet = info.addresses.find((a) => a.family === "inet");
      if (inet) result[device] = inet.address;
    }
    return result;
  }

  exec(id: string, argv: readonly string[], options: ExecOptions = {}): Promise<number> {
    const mode = options.interactive === true ? "--force-interactive" : "--force-noninteractive";
    return this.runner.run(LXC, ["exec", id, mode, "--", ...argv]);
  }

  async pushFile(id: string, path: string, content: string): Promise<void> {
    const dir = await mkdtemp(join(tmpdir(), "provision-"));
    const staged = join(dir, "content");
    try {
      await writeFile(staged, content, "utf-8");
      await this.runner.capture(LXC, ["file", "push", staged, `${id}${path}`]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private async find(id: string): Promise<LxcInstance | null> {
    // `lxc list <name>` filters by prefix, so match the name exactly.
    const output = await this.runner.capture(LXC, ["list", id, "--format", "json"]);
    const parsed = z.array(lxcInstanceSchema).safeParse(JSON.parse(output));
    if (!parsed.success) {
      throw new RuntimeCommandError(`Unexpected output from lxc list: ${parsed.error.message}`);
    }
    return parsed.data.find((i) => i.name === id) ?? null;
  }
}
