/** Thrown when the requirement graph reachable from a container has a cycle. */
export class CycleError extends Error {
  readonly name = "CycleError" as const;
  constructor(readonly unresolved: readonly string[]) {
    super(`Unresolvable requirements: ${unresolved.join(", ")}`);
  }
}

/** Thrown when a container in the launch order has no instance in the runtime. */
export class MissingDependencyError extends Error {
  readonly name = "MissingDependencyError" as const;
  constructor(
    readonly containerId: string,
    containerName: string,
  ) {
    super(`Requires ${containerName} (${containerId}), but it does not exist`);
  }
}

/** Thrown when a container has no IPv4 address on the requested device. */
export class AddressNotFoundError extends Error {
  readonly name = "AddressNotFoundError" as const;
  constructor(
    readonly containerId: string,
    readonly device: string,
  ) {
    super(`Container ${containerId} has no address on device ${device}`);
  }
}
