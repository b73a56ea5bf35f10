import { z } from "zod";

/** Parse a boolean-ish env value. `z.coerce.boolean()` treats "false" as true. */
function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  return !["0", "false", "no", "off"].includes(raw.trim().toLowerCase());
}

const configSchema = z.object({
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Which container runtime adapter drives the instances. */
  runtime: z.enum(["lxd", "docker"]).default("lxd"),

  docker: z
    .object({
      socketPath: z.string().min(1).default("/var/run/docker.sock"),
    })
    .default({ socketPath: "/var/run/docker.sock" }),

  definitions: z
    .object({
      dir: z.string().min(1).default("."),
      variablesFile: z.string().optional(),
    })
    .default({ dir: "." }),

  /** Pause after start/launch so the instance can pick up its network address. */
  settleDelayMs: z.coerce.number().int().min(0).default(5000),

  nat: z
    .object({
      /** Host ingress interface for DNAT rules; omitted from the rule when unset. */
      interface: z.string().min(1).optional(),
      useSudo: z.boolean().default(true),
    })
    .default({ useSudo: true }),
});

export const config = configSchema.parse({
  logLevel: process.env.LOG_LEVEL,
  runtime: process.env.PROVISION_RUNTIME,
  docker: {
    socketPath: process.env.DOCKER_SOCKET,
  },
  definitions: {
    dir: process.env.DEFINITIONS_DIR,
    variablesFile: process.env.VARIABLES_FILE || undefined,
  },
  settleDelayMs: process.env.SETTLE_DELAY_MS,
  nat: {
    interface: process.env.NAT_INTERFACE || undefined,
    useSudo: parseFlag(process.env.NAT_USE_SUDO),
  },
});

export type Config = z.infer<typeof configSchema>;
export { configSchema };
