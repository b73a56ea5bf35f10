import fs from "node:fs";
import yaml from "js-yaml";
import { fileDropStep, parseRpcTokens } from "../actions/steps.js";
import { logger } from "../config/logger.js";
import { definitionSchema, globalVariablesSchema } from "./definition-schema.js";
import { DefinitionError } from "./errors.js";
import { type ContainerDefinition, DEFAULT_SHELL, DEFAULT_USER } from "./types.js";

const rpcScalarType = new yaml.Type("!rpc", {
  kind: "scalar",
  resolve: (data: unknown) => typeof data === "string",
  construct: (data: string) => parseRpcTokens(data),
});

const rpcSequenceType = new yaml.Type("!rpc", {
  kind: "sequence",
  resolve: (data: unknown) => Array.isArray(data),
  construct: (data: unknown[]) => parseRpcTokens(data.map((token) => String(token))),
});

const fileDropType = new yaml.Type("!df", {
  kind: "scalar",
  resolve: (data: unknown) => typeof data === "string" && data !== "",
  construct: (data: string) => fileDropStep(data),
});

/** js-yaml schema that understands the `!rpc` and `!df` step tags. */
export const DEFINITION_SCHEMA = yaml.DEFAULT_SCHEMA.extend([rpcScalarType, rpcSequenceType, fileDropType]);

function loadYaml(content: string, source: string): unknown {
  try {
    return yaml.load(content, { schema: DEFINITION_SCHEMA, filename: source });
  } catch (err) {
    if (err instanceof DefinitionError) throw new DefinitionError(err.message, source);
    const message = err instanceof Error ? err.message : String(err);
    throw new DefinitionError(message, source);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate one definition file. The definition may be nested
 * under a top-level `container:` key or given flat.
 */
export function parseDefinition(id: string, content: string, source = `${id}.yaml`): ContainerDefinition {
  const raw = loadYaml(content, source);
  const body = isRecord(raw) && isRecord(raw.container) ? raw.container : raw;

  const result = definitionSchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new DefinitionError(issues, source);
  }

  const data = result.data;
  return {
    id,
    name: data.name,
    description: data.description,
    box: data.box,
    shell: data.shell ?? DEFAULT_SHELL,
    user: data.user ?? DEFAULT_USER,
    requires: [...(data.requires ?? [])],
    actions: data.actions ?? {},
    ports: (data.ports ?? []).map((p) => ({
      device: p.device,
      protocol: p.protocol,
      fromPort: p.from,
      toPort: p.to,
      comment: p.comment ?? data.name,
    })),
    mountpoints: Object.entries(data.mountpoints ?? {}).map(([name, mp]) => ({
      name,
      source: mp.source,
      path: mp.path,
    })),
    variables: data.variables ?? {},
    files: data.files ?? {},
  };
}

/**
 * Read the outermost variable scope from a YAML file with a top-level
 * `variables:` mapping. A missing file yields an empty scope.
 */
export function loadGlobalVariables(filePath: string | undefined): Record<string, string> {
  if (!filePath) return {};
  if (!fs.existsSync(filePath)) {
    logger.warn(`Variables file ${filePath} not found, continuing without global variables`);
    return {};
  }

  const raw = loadYaml(fs.readFileSync(filePath, "utf-8"), filePath);
  const result = globalVariablesSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new DefinitionError(result.error.issues.map((i) => i.message).join("; "), filePath);
  }
  return result.data.variables ?? {};
}
