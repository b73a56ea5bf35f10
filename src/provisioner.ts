import Docker from "dockerode";
import { ActionExecutor } from "./actions/action-executor.js";
import type { Config } from "./config/index.js";
import { loadGlobalVariables } from "./definitions/definition-loader.js";
import { DefinitionRegistry } from "./definitions/registry.js";
import { IptablesRuleTable } from "./nat/iptables-rule-table.js";
import { PortForwarder } from "./nat/port-forwarder.js";
import type { NatRuleTable } from "./nat/types.js";
import { DockerRuntime } from "./runtime/docker-runtime.js";
import { LxdRuntime } from "./runtime/lxd-runtime.js";
import type { ContainerRuntime } from "./runtime/types.js";
import { Templating } from "./templating/templating.js";

export interface ProvisionerOptions {
  definitionsDir: string;
  variablesFile?: string;
  settleDelayMs: number;
  runtime: ContainerRuntime;
  natTable: NatRuleTable;
  sleep?: (ms: number) => Promise<void>;
}

export interface Provisioner {
  registry: DefinitionRegistry;
  actions: ActionExecutor;
}

/** Wire one registry and the collaborators its containers share. */
export function createProvisioner(options: ProvisionerOptions): Provisioner {
  const templating = new Templating(loadGlobalVariables(options.variablesFile));
  const actions = new ActionExecutor(templating);
  const registry = new DefinitionRegistry(options.definitionsDir, {
    runtime: options.runtime,
    ports: new PortForwarder(options.natTable),
    actions,
    settleDelayMs: options.settleDelayMs,
    sleep: options.sleep,
  });
  return { registry, actions };
}

export function createRuntime(cfg: Pick<Config, "runtime" | "docker">): ContainerRuntime {
  if (cfg.runtime === "docker") {
    return new DockerRuntime(new Docker({ socketPath: cfg.docker.socketPath }));
  }
  return new LxdRuntime();
}

export function createNatTable(cfg: Pick<Config, "nat">): NatRuleTable {
  return new IptablesRuleTable({ useSudo: cfg.nat.useSudo, ingressInterface: cfg.nat.interface });
}
