import { type Duplex, PassThrough } from "node:stream";
import Docker from "dockerode";
import { logger } from "../config/logger.js";
import {
  type ContainerRuntime,
  type ExecOptions,
  type LaunchRequest,
  RuntimeCommandError,
  type RuntimeState,
} from "./types.js";

const MANAGED_LABEL = "provision.managed";
const ID_LABEL = "provision.container-id";

/** `2: eth0    inet 172.17.0.2/16 brd ...` */
const IP_ADDR_LINE_RE = /^\d+:\s+(\S+)\s+inet\s+([0-9.]+)\//;

function statusCode(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err) {
    const code = err.statusCode;
    return typeof code === "number" ? code : undefined;
  }
  return undefined;
}

/**
 * Docker through dockerode. Instances keep a tty open so a plain distro
 * image stays up like a system container, and mountpoints become binds.
 */
export class DockerRuntime implements ContainerRuntime {
  readonly docker: Docker;

  constructor(docker?: Docker) {
    this.docker = docker ?? new Docker({ socketPath: "/var/run/docker.sock" });
  }

  async exists(id: string): Promise<boolean> {
    return (await this.inspect(id)) !== null;
  }

  async state(id: string): Promise<RuntimeState> {
    const info = await this.inspect(id);
    if (!info) return "absent";
    return info.State.Running ? "running" : "stopped";
  }

  async launch(request: LaunchRequest): Promise<boolean> {
    let created: Docker.Container | undefined;
    try {
      await this.pullImage(request.box);
      created = await this.docker.createContainer({
        Image: request.box,
        name: request.id,
        Tty: true,
        OpenStdin: true,
        Labels: {
          [MANAGED_LABEL]: "true",
          [ID_LABEL]: request.id,
        },
        HostConfig: {
          Binds: request.mountpoints.map((mp) => `${mp.source}:${mp.path}`),
        },
      });
      await created.start();
      logger.debug(`Created container ${created.id} for ${request.id}`);
      return true;
    } catch (err) {
      logger.error(`Docker refused to launch ${request.id}`, {
        error: err instanceof Error ? err.message : String(err),
      });
      // A failed launch leaves nothing behind.
      if (created) await this.discard(created, request.id);
      return false;
    }
  }

  async start(id: string): Promise<void> {
    await this.docker.getContainer(id).start();
  }

  async stop(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).stop();
    } catch (err) {
      // 304: container already stopped
      if (statusCode(err) !== 304) throw err;
    }
  }

  async remove(id: string): Promise<void> {
    await this.docker.getContainer(id).remove({ force: true });
  }

  async addresses(id: string): Promise<Record<string, string>> {
    const { exitCode, output } = await this.captureExec(id, ["ip", "-4", "-o", "addr", "show"]);
    if (exitCode !== 0) {
      throw new RuntimeCommandError(`ip addr show failed in ${id}: ${output.trim()}`, exitCode);
    }

    const result: Record<string, string> = {};
    for (const line of output.split("\n")) {
      const match = IP_ADDR_LINE_RE.exec(line.trim());
      if (match && !(match[1] in result)) {
        result[match[1]] = match[2];
      }
    }
    return result;
  }

  async exec(id: string, argv: readonly string[], options: ExecOptions = {}): Promise<number> {
    const interactive = options.interactive === true;
    const exec = await this.docker.getContainer(id).exec({
      Cmd: [...argv],
      AttachStdin: interactive,
      AttachStdout: true,
      AttachStderr: true,
      Tty: interactive,
    });
    const stream = await exec.start({ hijack: true, stdin: interactive, Tty: interactive });

    if (interactive) {
      process.stdin.pipe(stream);
      stream.pipe(process.stdout);
    } else {
      this.docker.modem.demuxStream(stream, process.stdout, process.stderr);
    }
    await this.waitForEnd(stream);
    if (interactive) process.stdin.unpipe(stream);

    const info = await exec.inspect();
    return info.ExitCode ?? 1;
  }

  /** Streams `content` into `cat` over the exec's stdin, so its size is not bound by argv limits. */
  async pushFile(id: string, path: string, content: string): Promise<void> {
    const exec = await this.docker.getContainer(id).exec({
      Cmd: ["sh", "-c", 'cat > "$1"', "sh", path],
      AttachStdin: true,
      AttachStdout: true,
      AttachStderr: true,
      Tty: false,
    });
    const stream = await exec.start({ hijack: true, stdin: true, Tty: false });

    let output = "";
    const sink = new PassThrough();
    sink.on("data", (chunk: Buffer) => {
      output += chunk.toString();
    });
    this.docker.modem.demuxStream(stream, sink, sink);
    const ended = this.waitForEnd(stream);
    stream.end(Buffer.from(content, "utf-8"));
    await ended;

    const info = await exec.inspect();
    const exitCode = info.ExitCode ?? 1;
    if (exitCode !== 0) {
      throw new RuntimeCommandError(`Writing ${path} in ${id} failed: ${output.trim()}`, exitCode);
    }
  }

  private async inspect(id: string): Promise<Docker.ContainerInspectInfo | null> {
    try {
      return await this.docker.getContainer(id).inspect();
    } catch (err) {
      if (statusCode(err) === 404) return null;
      throw err;
    }
  }

  /** Run argv with a tty so stdout and stderr arrive as one plain stream. */
  private async captureExec(id: string, argv: string[]): Promise<{ exitCode: number; output: string }> {
    const exec = await this.docker.getContainer(id).exec({
      Cmd: argv,
      AttachStdout: true,
      AttachStderr: true,
      Tty: true,
    });
    const stream = await exec.start({ hijack: true, stdin: false, Tty: true });

    let output = "";
    stream.on("data", (chunk: Buffer) => {
      output += chunk.toString();
    });
    await this.waitForEnd(stream);

    const info = await exec.inspect();
    return { exitCode: info.ExitCode ?? 1, output };
  }

  private waitForEnd(stream: Duplex): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      stream.on("end", () => resolve());
      stream.on("error", reject);
    });
  }

  private async discard(container: Docker.Container, id: string): Promise<void> {
    try {
      await container.remove({ force: true });
    } catch (err) {
      logger.warn(`Could not remove half-launched container ${id}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private async pullImage(image: string): Promise<void> {
    logger.info(`Pulling image ${image}`);
    const stream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
