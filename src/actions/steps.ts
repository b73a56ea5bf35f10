import { DefinitionError } from "../definitions/errors.js";

/** Run a templated command line inside the container. */
export interface ShellStep {
  kind: "shell";
  command: string;
}

/** Run an action of another (or the same) container with the given parameters. */
export interface RpcStep {
  kind: "rpc";
  container: string;
  action: string;
  parameters: Record<string, string>;
}

/** Render an entry of the container's `files` map and write it into the container. */
export interface FileDropStep {
  kind: "file-drop";
  path: string;
}

export type ActionStep = ShellStep | RpcStep | FileDropStep;

export function shellStep(command: string): ShellStep {
  return { kind: "shell", command };
}

/**
 * Build an RPC step from `target action key=value...`, given either as a
 * token list or as one space-delimited string. Empty tokens are ignored and
 * each parameter is split at its first `=`.
 */
export function parseRpcTokens(input: string | readonly string[]): RpcStep {
  const tokens = (typeof input === "string" ? input.split(" ") : input).filter((t) => t !== "");
  const [container, action, ...rest] = tokens;
  if (!container || !action) {
    throw new DefinitionError(`RPC needs a target container and an action (got: "${tokens.join(" ")}")`);
  }

  const parameters: Record<string, string> = {};
  for (const token of rest) {
    const eq = token.indexOf("=");
    if (eq <= 0) {
      throw new DefinitionError(`RPC parameter "${token}" is not of the form key=value`);
    }
    parameters[token.slice(0, eq)] = token.slice(eq + 1);
  }

  return { kind: "rpc", container, action, parameters };
}

export function fileDropStep(path: string): FileDropStep {
  if (!path.startsWith("/")) {
    throw new DefinitionError(`File drop path must be absolute (got: "${path}")`);
  }
  return { kind: "file-drop", path };
}

/** One-line description used when logging a step. */
export function describeStep(step: ActionStep): string {
  switch (step.kind) {
    case "shell":
      return step.command;
    case "rpc": {
      const params = Object.entries(step.parameters).map(([k, v]) => `${k}=${v}`);
      return ["rpc", step.container, step.action, ...params].join(" ");
    }
    case "file-drop":
      return `drop ${step.path}`;
  }
}
