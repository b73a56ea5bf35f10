import { Command } from "commander";
import type { ActionExecutor } from "./actions/action-executor.js";
import { parseRpcTokens } from "./actions/steps.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import type { DefinitionRegistry } from "./definitions/registry.js";
import type { Container } from "./lifecycle/container.js";
import { createNatTable, createProvisioner, createRuntime, type Provisioner } from "./provisioner.js";

export const LIFECYCLE_VERBS = ["create", "destroy", "up", "down", "nat", "denat", "login", "exec"] as const;

export interface CliOptions {
  definitionsDir?: string;
  variablesFile?: string;
  recursive?: boolean;
  list?: boolean;
}

/**
 * Run `verb` against `container` and return the exit status for the
 * process. `exec <action> k=v...` and any verb that is not a lifecycle
 * verb call that action on the container itself.
 */
export async function dispatch(
  container: Container,
  verb: string,
  params: readonly string[],
  actions: ActionExecutor,
  options: Pick<CliOptions, "recursive"> = {},
): Promise<number> {
  switch (verb) {
    case "create":
      return (await container.create()).exitCode;
    case "destroy":
      return (await container.destroy()).exitCode;
    case "up":
      return (await container.up(options.recursive === true)).exitCode;
    case "down":
      return (await container.down()).exitCode;
    case "nat":
      await container.nat();
      return 0;
    case "denat":
      await container.denat();
      return 0;
    case "login":
      return container.login();
    case "exec": {
      const outcome = await actions.executeStep(container, parseRpcTokens([container.id, ...params]), {});
      return outcome.exitCode;
    }
    default: {
      const outcome = await actions.executeStep(container, parseRpcTokens([container.id, verb, ...params]), {});
      return outcome.exitCode;
    }
  }
}

/** Print every definition as `id  name  description`. */
export function listDefinitions(registry: DefinitionRegistry): string[] {
  const ids = registry.list();
  const width = Math.max(0, ...ids.map((id) => id.length));
  return ids.map((id) => {
    const container = registry.get(id);
    return `${id.padEnd(width)}  ${container.name}  ${container.description}`.trimEnd();
  });
}

function defaultProvisioner(options: CliOptions): Provisioner {
  return createProvisioner({
    definitionsDir: options.definitionsDir ?? config.definitions.dir,
    variablesFile: options.variablesFile ?? config.definitions.variablesFile,
    settleDelayMs: config.settleDelayMs,
    runtime: createRuntime(config),
    natTable: createNatTable(config),
  });
}

export function buildProgram(makeProvisioner: (options: CliOptions) => Provisioner = defaultProvisioner): Command {
  const program: Command = new Command();

  program
    .name("provision")
    .description("Manager/provisioner for system containers described in YAML definitions")
    .argument("[container]", "container to work on")
    .argument("[verb]", `${LIFECYCLE_VERBS.join("|")} or the name of an action`)
    .argument("[params...]", "key=value parameters for the action")
    .option("-d, --definitions-dir <dir>", "definitions directory")
    .option("-v, --variables-file <file>", "YAML file with global variable values")
    .option("-r, --recursive", "bring up requirements first (up only)", false)
    .option("-l, --list", "list the available definitions", false)
    .action(async (containerId: string | undefined, verb: string | undefined, params: string[], options: CliOptions) => {
      const provisioner = makeProvisioner(options);

      if (options.list) {
        for (const line of listDefinitions(provisioner.registry)) {
          logger.info(line);
        }
        return;
      }
      if (!containerId || !verb) {
        program.error("error: a container and a verb are required");
      }

      const container = provisioner.registry.get(containerId);
      process.exitCode = await dispatch(container, verb, params, provisioner.actions, options);
    });

  return program;
}

/** Entry point: parse argv, run, and map any uncaught error to exit status 1. */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync([...argv]);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
