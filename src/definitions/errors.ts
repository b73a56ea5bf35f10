/** Thrown when no `.yaml` or `.yml` definition exists for a container id. */
export class DefinitionNotFoundError extends Error {
  readonly name = "DefinitionNotFoundError" as const;
  constructor(
    readonly containerId: string,
    readonly definitionsDir: string,
  ) {
    super(`No definition for container "${containerId}" in ${definitionsDir}`);
  }
}

/** Thrown when a definition file is malformed or misses a required attribute. */
export class DefinitionError extends Error {
  readonly name = "DefinitionError" as const;
  constructor(
    message: string,
    readonly source?: string,
  ) {
    super(source ? `Invalid definition "${source}": ${message}` : message);
  }
}
