import fs from "node:fs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildProgram, dispatch, listDefinitions } from "./cli.js";
import { logger } from "./config/logger.js";
import { makeTestProvisioner, type TestProvisioner } from "./test/fakes.js";

vi.mock("./config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

const DB = "name: DB\ndescription: Database\nbox: images:debian/12\n";

const SVC = `
name: Svc
description: Service
box: images:debian/12
variables:
  PORT: 80
actions:
  show:
    - echo port $PORT
  fail:
    - exit 7
`;

describe("dispatch", () => {
  let p: TestProvisioner;

  beforeEach(() => {
    vi.clearAllMocks();
    p = makeTestProvisioner({ "db.yaml": DB, "svc.yaml": SVC });
  });

  afterEach(() => {
    fs.rmSync(p.dir, { recursive: true, force: true });
  });

  it("maps lifecycle results to exit statuses", async () => {
    const db = p.registry.get("db");
    expect(await dispatch(db, "up", [], p.actions)).toBe(1);
    expect(await dispatch(db, "create", [], p.actions)).toBe(0);
    expect(await dispatch(db, "down", [], p.actions)).toBe(0);
    expect(await dispatch(db, "destroy", [], p.actions)).toBe(0);
    expect(p.runtime.calls).toEqual(["launch db", "stop db", "remove db"]);
  });

  it("runs nat and denat", async () => {
    p.runtime.add("db", "running");
    expect(await dispatch(p.registry.get("db"), "nat", [], p.actions)).toBe(0);
    expect(await dispatch(p.registry.get("db"), "denat", [], p.actions)).toBe(0);
  });

  it("runs an action through exec with parameters", async () => {
    expect(await dispatch(p.registry.get("svc"), "exec", ["show", "PORT=9"], p.actions)).toBe(0);
    expect(p.runtime.commands("svc")).toEqual(["echo port 9"]);
  });

  it("treats any other verb as an action name", async () => {
    expect(await dispatch(p.registry.get("svc"), "show", [], p.actions)).toBe(0);
    expect(await dispatch(p.registry.get("svc"), "fail", [], p.actions)).toBe(0);
    p.runtime.exitCodes.set("exit 7", 7);
    expect(await dispatch(p.registry.get("svc"), "fail", [], p.actions)).toBe(7);
    expect(p.runtime.commands("svc")).toEqual(["echo port 80", "exit 7", "exit 7"]);
  });

  it("returns the login shell's status", async () => {
    expect(await dispatch(p.registry.get("db"), "login", [], p.actions)).toBe(1);
  });
});

describe("listDefinitions", () => {
  it("aligns ids and shows name and description", () => {
    const p = makeTestProvisioner({ "db.yaml": DB, "svc.yaml": SVC, "notes.txt": "x" });
    try {
      expect(listDefinitions(p.registry)).toEqual(["db   DB  Database", "svc  Svc  Service"]);
    } finally {
      fs.rmSync(p.dir, { recursive: true, force: true });
    }
  });
});

describe("buildProgram", () => {
  let p: TestProvisioner;

  beforeEach(() => {
    vi.clearAllMocks();
    p = makeTestProvisioner({ "db.yaml": DB, "svc.yaml": SVC });
  });

  afterEach(() => {
    process.exitCode = undefined;
    fs.rmSync(p.dir, { recursive: true, force: true });
  });

  function program() {
    return buildProgram(() => p)
      .exitOverride()
      .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  }

  it("sets the exit status from the verb", async () => {
    p.runtime.exitCodes.set("echo port 80", 4);
    await program().parseAsync(["node", "provision", "svc", "show"]);
    expect(process.exitCode).toBe(4);
  });

  it("passes --recursive to up", async () => {
    p.runtime.add("db", "stopped");
    await program().parseAsync(["node", "provision", "-r", "db", "up"]);
    expect(process.exitCode).toBe(0);
    expect(p.runtime.calls).toEqual(["start db"]);
  });

  it("lists definitions with --list", async () => {
    await program().parseAsync(["node", "provision", "--list"]);
    expect(logger.info).toHaveBeenCalledWith("db   DB  Database");
    expect(logger.info).toHaveBeenCalledWith("svc  Svc  Service");
  });

  it("requires a container and a verb", async () => {
    await expect(program().parseAsync(["node", "provision", "db"])).rejects.toThrow(
      "error: a container and a verb are required",
    );
  });
});
