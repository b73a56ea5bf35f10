import type { Container } from "../lifecycle/container.js";
import type { Templating, VariableScope } from "../templating/templating.js";
import { dropFile, invokeRpc } from "./special-actions.js";
import { type ActionStep, describeStep } from "./steps.js";

export type ActionStatus = "completed" | "failed" | "missing";

export interface ActionResult {
  action: string;
  status: ActionStatus;
  /** Exit status of the failing step, 0 unless `status` is "failed". */
  exitCode: number;
  /** Steps attempted, including a failing one. */
  stepsRun: number;
}

export interface StepOutcome {
  ok: boolean;
  exitCode: number;
}

/**
 * Runs a container's named action step by step. A step that exits
 * non-zero stops the action; steps already run are not undone. Errors
 * thrown by a step are logged and propagate.
 */
export class ActionExecutor {
  constructor(readonly templating: Templating) {}

  async execute(container: Container, action: string, parameters: VariableScope = {}): Promise<ActionResult> {
    if (!Object.hasOwn(container.actions, action)) {
      container.log(`Action "${action}" does not exist`);
      return { action, status: "missing", exitCode: 0, stepsRun: 0 };
    }

    container.log(`Execute action "${action}"`);
    const steps = container.actions[action];
    let stepsRun = 0;
    for (const step of steps) {
      stepsRun++;
      let outcome: StepOutcome;
      try {
        outcome = await this.executeStep(container, step, parameters);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        container.logError(`Action "${action}" aborted at step ${stepsRun} (${describeStep(step)}): ${message}`);
        throw err;
      }
      if (!outcome.ok) {
        container.logError("Execution failed", { action, step: stepsRun, exitCode: outcome.exitCode });
        return { action, status: "failed", exitCode: outcome.exitCode, stepsRun };
      }
    }
    return { action, status: "completed", exitCode: 0, stepsRun };
  }

  executeStep(container: Container, step: ActionStep, parameters: VariableScope): Promise<StepOutcome> {
    switch (step.kind) {
      case "shell":
        return this.runShell(container, step.command, parameters);
      case "rpc":
        return invokeRpc(step, container, this.templating);
      case "file-drop":
        return dropFile(step, container, this.templating);
    }
  }

  private async runShell(container: Container, command: string, parameters: VariableScope): Promise<StepOutcome> {
    const line = this.templating.apply(command, container.variables, parameters);
    container.log(line);
    const exitCode = await container.exec(line);
    return { ok: exitCode === 0, exitCode };
  }
}
