import { setTimeout as delay } from "node:timers/promises";
import type { ActionExecutor, ActionResult } from "../actions/action-executor.js";
import type { ActionStep } from "../actions/steps.js";
import { logger } from "../config/logger.js";
import type { ContainerDefinition, Mountpoint, PortMapping } from "../definitions/types.js";
import type { AddressSource, PortForwarder } from "../nat/port-forwarder.js";
import type { ContainerRuntime } from "../runtime/types.js";
import type { VariableScope } from "../templating/templating.js";
import { AddressNotFoundError } from "./errors.js";
import { resolveLaunchOrder } from "./launch-order.js";
import { type ContainerState, canPerform, type LifecycleOperation, skipReason } from "./state-machine.js";

/** Registry view a container needs to reach other containers. */
export interface ContainerLookup {
  get(id: string): Container;
  has(id: string): boolean;
}

/** Collaborators shared by every container of one registry. */
export interface ContainerServices {
  runtime: ContainerRuntime;
  ports: PortForwarder;
  actions: ActionExecutor;
  /** Pause after start/launch before the network address is read. */
  settleDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface LifecycleResult {
  /** False when the operation was skipped (wrong state, unmet requirements, refused launch). */
  performed: boolean;
  /** Exit status of the first failed action, 0 when every action succeeded. */
  exitCode: number;
}

const SKIPPED: LifecycleResult = { performed: false, exitCode: 0 };
const REFUSED: LifecycleResult = { performed: false, exitCode: 1 };

function firstFailure(...results: ActionResult[]): number {
  return results.find((r) => r.status === "failed")?.exitCode ?? 0;
}

/**
 * One container definition bound to the runtime. Lifecycle state is read
 * from the runtime on every call; the only cached value is the device
 * address map, dropped whenever the instance is started or stopped.
 */
export class Container implements AddressSource {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly box: string;
  readonly shell: string;
  readonly user: string;
  readonly requires: readonly string[];
  readonly actions: Readonly<Record<string, readonly ActionStep[]>>;
  readonly ports: readonly PortMapping[];
  readonly mountpoints: readonly Mountpoint[];
  readonly variables: VariableScope;
  readonly files: Readonly<Record<string, string>>;

  private ips: Record<string, string> | null = null;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    definition: ContainerDefinition,
    readonly registry: ContainerLookup,
    private readonly services: ContainerServices,
  ) {
    this.id = definition.id;
    this.name = definition.name;
    this.description = definition.description;
    this.box = definition.box;
    this.shell = definition.shell;
    this.user = definition.user;
    this.requires = definition.requires;
    this.actions = definition.actions;
    this.ports = definition.ports;
    this.mountpoints = definition.mountpoints;
    this.variables = definition.variables;
    this.files = definition.files;
    this.sleep = services.sleep ?? ((ms) => delay(ms));
  }

  get runtime(): ContainerRuntime {
    return this.services.runtime;
  }

  /** Log prefixed with the container's display name. */
  log(message: string, meta?: Record<string, unknown>): void {
    if (meta) logger.info(`[${this.name}] ${message}`, meta);
    else logger.info(`[${this.name}] ${message}`);
  }

  logError(message: string, meta?: Record<string, unknown>): void {
    if (meta) logger.error(`[${this.name}] ${message}`, meta);
    else logger.error(`[${this.name}] ${message}`);
  }

  state(): Promise<ContainerState> {
    return this.runtime.state(this.id);
  }

  exists(): Promise<boolean> {
    return this.runtime.exists(this.id);
  }

  async isRunning(): Promise<boolean> {
    return (await this.state()) === "running";
  }

  /**
   * Check that every direct requirement exists and, unless `ignoreStopped`,
   * is running. Logs each unmet requirement.
   */
  async checkRequirements(ignoreStopped = false): Promise<boolean> {
    let okay = true;
    for (const id of this.requires) {
      const requirement = this.registry.get(id);
      const state = await requirement.state();
      if (state === "absent") {
        this.log(`Requires ${requirement.name} (${requirement.id}), but it does not exist`);
        okay = false;
      } else if (!ignoreStopped && state !== "running") {
        this.log(`Requires ${requirement.name} (${requirement.id}), but it is not running`);
        okay = false;
      }
    }
    return okay;
  }

  /** Ids of every transitive requirement in the order they must start. */
  getLaunchOrder(): Promise<string[]> {
    return resolveLaunchOrder(this, this.registry);
  }

  /**
   * Launch a new instance from `box`, attach its mountpoints, forward its
   * ports and run the `create` then `up` actions. Direct requirements must
   * exist; they only have to be running when `ignoreStopped` is false.
   */
  async create(options: { ignoreStopped?: boolean } = {}): Promise<LifecycleResult> {
    this.log(`Create new container ${this.id} from ${this.box}`);
    const skipped = await this.gate("create");
    if (skipped) return skipped;

    if (!(await this.checkRequirements(options.ignoreStopped ?? true))) {
      this.log("Requirements not met");
      return REFUSED;
    }

    const launched = await this.runtime.launch({ id: this.id, box: this.box, mountpoints: this.mountpoints });
    if (!launched) {
      this.logError("Creation failed");
      return REFUSED;
    }
    for (const mp of this.mountpoints) {
      this.log(`Mounted ${mp.name}`, { source: mp.source, path: mp.path });
    }

    this.ips = null;
    await this.settle();
    await this.nat();
    const created = await this.executeAction("create");
    const started = await this.executeAction("up");
    this.log("Done");
    return { performed: true, exitCode: firstFailure(created, started) };
  }

  /** Take the instance down if it is running, run the `destroy` action and delete it. */
  async destroy(): Promise<LifecycleResult> {
    const state = await this.state();
    const skipped = this.check("destroy", state);
    if (skipped) return skipped;

    let stopped: ActionResult | undefined;
    if (state === "running") {
      stopped = await this.stopInstance();
    }
    const destroyed = await this.executeAction("destroy");
    this.log("Deleting...");
    await this.runtime.remove(this.id);
    this.ips = null;
    this.log("Done");
    return { performed: true, exitCode: firstFailure(...(stopped ? [stopped, destroyed] : [destroyed])) };
  }

  /**
   * Start the instance, forward its ports and run the `up` action. With
   * `recursive`, stopped requirements are brought up first in launch order.
   */
  async up(recursive = false): Promise<LifecycleResult> {
    const skipped = await this.gate("up");
    if (skipped) return skipped;

    if (!(await this.checkRequirements(recursive))) {
      this.log("Requirements not met");
      return REFUSED;
    }

    if (recursive) {
      for (const id of await this.getLaunchOrder()) {
        const requirement = this.registry.get(id);
        if (await requirement.isRunning()) continue;
        const result = await requirement.up(false);
        if (!result.performed) {
          this.logError(`Could not bring up ${requirement.name} (${requirement.id})`);
          return REFUSED;
        }
      }
    }

    this.log("Starting...");
    await this.runtime.start(this.id);
    this.ips = null;
    await this.settle();
    await this.nat();
    const started = await this.executeAction("up");
    this.log("Done");
    return { performed: true, exitCode: firstFailure(started) };
  }

  /** Run the `down` action, remove port forwards and stop the instance. */
  async down(): Promise<LifecycleResult> {
    const skipped = await this.gate("down");
    if (skipped) return skipped;

    this.log("Stopping...");
    const stopped = await this.stopInstance();
    this.log("Done");
    return { performed: true, exitCode: firstFailure(stopped) };
  }

  /** (Re)install the DNAT rule of every port. Does nothing unless running. */
  async nat(): Promise<boolean> {
    if (!(await this.isRunning())) {
      this.log("Container not running, no NAT needed");
      return false;
    }
    for (const port of this.ports) {
      const ip = await this.getIp(port.device);
      this.log(`Forwarding ${port.toPort} to ${ip}:${port.fromPort} (${port.device})`);
      await this.services.ports.replace(this, port);
    }
    return true;
  }

  /** Remove the DNAT rules of every port. */
  async denat(): Promise<void> {
    for (const port of this.ports) {
      this.log(`Removing forward from ${port.toPort} to port ${port.fromPort} (${port.device})`);
      await this.services.ports.delete(port);
    }
  }

  /**
   * Run `command` through the configured shell as the configured user.
   * Without a command the shell is interactive.
   */
  exec(command?: string): Promise<number> {
    const argv = ["sudo", "--login", "--user", this.user, this.shell];
    if (command !== undefined) argv.push("-c", command);
    return this.runtime.exec(this.id, argv, { interactive: command === undefined });
  }

  /** Open an interactive shell. Resolves to the shell's exit status. */
  async login(): Promise<number> {
    if (!(await this.isRunning())) {
      this.log("Not running");
      return 1;
    }
    return this.exec();
  }

  executeAction(action: string, parameters: VariableScope = {}): Promise<ActionResult> {
    return this.services.actions.execute(this, action, parameters);
  }

  /** Live IPv4 address of `device`. */
  async getIp(device = "eth0"): Promise<string> {
    if (!this.ips || !Object.hasOwn(this.ips, device)) {
      this.ips = await this.runtime.addresses(this.id);
    }
    if (!Object.hasOwn(this.ips, device)) {
      throw new AddressNotFoundError(this.id, device);
    }
    return this.ips[device];
  }

  /** Null when `operation` may run now, otherwise the result to return. */
  private async gate(operation: LifecycleOperation): Promise<LifecycleResult | null> {
    return this.check(operation, await this.state());
  }

  private check(operation: LifecycleOperation, state: ContainerState): LifecycleResult | null {
    if (canPerform(operation, state)) return null;
    this.log(skipReason(operation, state));
    // Starting something that was never created is a failure; everything else is a no-op.
    return operation === "up" && state === "absent" ? REFUSED : SKIPPED;
  }

  private async stopInstance(): Promise<ActionResult> {
    const stopped = await this.executeAction("down");
    await this.denat();
    await this.runtime.stop(this.id);
    this.ips = null;
    return stopped;
  }

  private async settle(): Promise<void> {
    if (this.services.settleDelayMs <= 0) return;
    this.log("Waiting for network to calm down");
    await this.sleep(this.services.settleDelayMs);
  }
}
