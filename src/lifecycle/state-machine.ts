import type { RuntimeState } from "../runtime/types.js";

/**
 * Container lifecycle states and the operations allowed from each.
 *
 * State is never stored: every operation asks the runtime first.
 *
 * ```
 * create   absent           → running
 * up       stopped          → running
 * down     running          → stopped
 * destroy  stopped, running → absent
 * ```
 */

export const CONTAINER_STATES = ["absent", "stopped", "running"] as const satisfies readonly RuntimeState[];

export type ContainerState = (typeof CONTAINER_STATES)[number];

export const LIFECYCLE_OPERATIONS = ["create", "up", "down", "destroy"] as const;

export type LifecycleOperation = (typeof LIFECYCLE_OPERATIONS)[number];

export const VALID_TRANSITIONS: Record<LifecycleOperation, { from: readonly ContainerState[]; to: ContainerState }> = {
  create: { from: ["absent"], to: "running" },
  up: { from: ["stopped"], to: "running" },
  down: { from: ["running"], to: "stopped" },
  destroy: { from: ["stopped", "running"], to: "absent" },
};

/** Check whether an operation may run against a container in `state`. */
export function canPerform(operation: LifecycleOperation, state: ContainerState): boolean {
  return VALID_TRANSITIONS[operation].from.includes(state);
}

/** Why an operation was skipped, phrased for the operator. */
export function skipReason(operation: LifecycleOperation, state: ContainerState): string {
  if (state === "absent") return "Does not exist";
  if (operation === "create") return "Already exists";
  if (state === "running") return "Already running";
  return "Is not running";
}
