import { describe, expect, it } from "vitest";
import { configSchema } from "./index.js";

describe("configSchema", () => {
  it("applies defaults to an empty environment", () => {
    expect(configSchema.parse({})).toEqual({
      logLevel: "info",
      runtime: "lxd",
      docker: { socketPath: "/var/run/docker.sock" },
      definitions: { dir: "." },
      settleDelayMs: 5000,
      nat: { useSudo: true },
    });
  });

  it("coerces the settle delay from a string", () => {
    expect(configSchema.parse({ settleDelayMs: "250" }).settleDelayMs).toBe(250);
  });

  it("rejects a negative settle delay", () => {
    expect(() => configSchema.parse({ settleDelayMs: "-1" })).toThrow();
  });

  it("rejects an unknown runtime", () => {
    expect(() => configSchema.parse({ runtime: "podman" })).toThrow();
  });

  it("keeps nested overrides", () => {
    const cfg = configSchema.parse({
      runtime: "docker",
      docker: { socketPath: "/run/user/1000/docker.sock" },
      definitions: { dir: "/etc/provision", variablesFile: "/etc/provision/vars.yaml" },
      nat: { interface: "enp3s0", useSudo: false },
    });
    expect(cfg.docker.socketPath).toBe("/run/user/1000/docker.sock");
    expect(cfg.definitions).toEqual({ dir: "/etc/provision", variablesFile: "/etc/provision/vars.yaml" });
    expect(cfg.nat).toEqual({ interface: "enp3s0", useSudo: false });
  });
});
