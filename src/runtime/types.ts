import type { Mountpoint } from "../definitions/types.js";

/** Instance state as reported by the runtime. */
export type RuntimeState = "absent" | "stopped" | "running";

export interface LaunchRequest {
  /** Instance name; equal to the container id. */
  id: string;
  /** Image (LXD remote:alias or Docker reference) the instance is created from. */
  box: string;
  /** Host directories attached to the new instance. */
  mountpoints: readonly Mountpoint[];
}

export interface ExecOptions {
  /** Attach the caller's terminal (stdin and a tty) to the command. */
  interactive?: boolean;
}

/**
 * The operations the provisioner needs from a container runtime. Every
 * call resolves once the runtime has finished (start and stop wait for the
 * instance to reach the new state).
 */
export interface ContainerRuntime {
  exists(id: string): Promise<boolean>;
  state(id: string): Promise<RuntimeState>;
  /** Create and start a new instance. Resolves false when the runtime refused. */
  launch(request: LaunchRequest): Promise<boolean>;
  start(id: string): Promise<void>;
  stop(id: string): Promise<void>;
  /** Delete the instance, forcing it down if it is still running. */
  remove(id: string): Promise<void>;
  /** IPv4 address of every network device that has one, keyed by device name. */
  addresses(id: string): Promise<Record<string, string>>;
  /** Run argv inside the instance with inherited output. Resolves to the exit status. */
  exec(id: string, argv: readonly string[], options?: ExecOptions): Promise<number>;
  pushFile(id: string, path: string, content: string): Promise<void>;
}

/** Thrown when a runtime command fails outside of a command's own exit status. */
export class RuntimeCommandError extends Error {
  readonly name = "RuntimeCommandError" as const;
  constructor(
    message: string,
    readonly exitCode?: number,
  ) {
    super(message);
  }
}
