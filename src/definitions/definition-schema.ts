import { z } from "zod";
import { type ActionStep, shellStep } from "../actions/steps.js";

/** YAML scalars in variable maps may be numbers or booleans; templates only see strings. */
const scalarString = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

const rpcStepSchema = z.object({
  kind: z.literal("rpc"),
  container: z.string().min(1),
  action: z.string().min(1),
  parameters: z.record(z.string()),
});

const fileDropStepSchema = z.object({
  kind: z.literal("file-drop"),
  path: z.string().min(1),
});

/** Plain strings are shell lines; tagged steps arrive already built by the YAML loader. */
export const actionStepSchema: z.ZodType<ActionStep, z.ZodTypeDef, unknown> = z.union([
  z.string().transform((command) => shellStep(command)),
  rpcStepSchema,
  fileDropStepSchema,
]);

const portSchema = z.object({
  device: z.string().min(1),
  protocol: z.enum(["tcp", "udp"]),
  from: z.coerce.number().int().min(1).max(65535),
  to: z.coerce.number().int().min(1).max(65535),
  comment: z.string().min(1).optional(),
});

const mountpointSchema = z.object({
  source: z.string().min(1),
  path: z.string().min(1),
});

/** Schema for one container definition file. */
export const definitionSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  box: z.string().min(1),
  shell: z.string().min(1).nullish(),
  user: z.string().min(1).nullish(),
  requires: z.array(z.string().min(1)).nullish(),
  actions: z.record(z.array(actionStepSchema)).nullish(),
  ports: z.array(portSchema).nullish(),
  mountpoints: z.record(mountpointSchema).nullish(),
  variables: z.record(scalarString).nullish(),
  files: z.record(z.string()).nullish(),
});

/** Global variables file: `variables:` at the top level. */
export const globalVariablesSchema = z.object({
  variables: z.record(scalarString).nullish(),
});
