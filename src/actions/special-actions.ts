import { posix } from "node:path";
import type { Container } from "../lifecycle/container.js";
import type { Templating } from "../templating/templating.js";
import type { StepOutcome } from "./action-executor.js";
import type { FileDropStep, RpcStep } from "./steps.js";

/** Thrown when a special step cannot be carried out. */
export class ActionStepError extends Error {
  readonly name = "ActionStepError" as const;
  constructor(
    message: string,
    readonly containerId: string,
  ) {
    super(message);
  }
}

/**
 * Run `step.action` on `step.container`. Parameter values are templated
 * against the calling container's variables before the call.
 */
export async function invokeRpc(step: RpcStep, caller: Container, templating: Templating): Promise<StepOutcome> {
  const target = caller.registry.get(step.container);
  const parameters: Record<string, string> = {};
  for (const [key, value] of Object.entries(step.parameters)) {
    parameters[key] = templating.apply(value, caller.variables);
  }

  const result = await target.executeAction(step.action, parameters);
  return { ok: result.status !== "failed", exitCode: result.exitCode };
}

/**
 * Render `files[step.path]` with the container's variables and write it
 * to that path inside the container, owned by the container's user.
 */
export async function dropFile(step: FileDropStep, container: Container, templating: Templating): Promise<StepOutcome> {
  const body = container.files[step.path];
  if (body === undefined) {
    throw new ActionStepError(`No file "${step.path}" defined for ${container.id}`, container.id);
  }

  container.log(`Dropping file ${step.path}`);
  await runOrThrow(container, ["mkdir", "-p", posix.dirname(step.path)]);
  await container.runtime.pushFile(container.id, step.path, templating.apply(body, container.variables));
  await runOrThrow(container, ["chown", `${container.user}:${container.user}`, step.path]);
  return { ok: true, exitCode: 0 };
}

async function runOrThrow(container: Container, argv: string[]): Promise<void> {
  const exitCode = await container.runtime.exec(container.id, argv);
  if (exitCode !== 0) {
    throw new ActionStepError(`"${argv.join(" ")}" exited with ${exitCode} in ${container.id}`, container.id);
  }
}
