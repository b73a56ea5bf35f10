import fs from "node:fs";
import path from "node:path";
import { Container, type ContainerLookup, type ContainerServices } from "../lifecycle/container.js";
import { parseDefinition } from "./definition-loader.js";
import { DefinitionError, DefinitionNotFoundError } from "./errors.js";

const DEFINITION_EXTENSIONS = [".yaml", ".yml"] as const;

/** Container ids double as file names and runtime instance names. */
const CONTAINER_ID_RE = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

/**
 * Loads container definitions from a directory on first lookup and keeps
 * one Container per id for the registry's lifetime.
 */
export class DefinitionRegistry implements ContainerLookup {
  private readonly containers = new Map<string, Container>();
  readonly definitionsDir: string;

  constructor(
    definitionsDir: string,
    private readonly services: ContainerServices,
  ) {
    this.definitionsDir = path.resolve(definitionsDir);
  }

  get(id: string): Container {
    const cached = this.containers.get(id);
    if (cached) return cached;

    const file = this.pathFor(id);
    if (!file) throw new DefinitionNotFoundError(id, this.definitionsDir);

    const definition = parseDefinition(id, fs.readFileSync(file, "utf-8"), path.basename(file));
    const container = new Container(definition, this, this.services);
    this.containers.set(id, container);
    return container;
  }

  /** False for ids that could never name a definition. */
  has(id: string): boolean {
    if (this.containers.has(id)) return true;
    return CONTAINER_ID_RE.test(id) && this.pathFor(id) !== null;
  }

  /** Ids of every definition file in the directory, sorted. */
  list(): string[] {
    if (!fs.existsSync(this.definitionsDir)) return [];
    const ids = new Set<string>();
    for (const file of fs.readdirSync(this.definitionsDir)) {
      const ext = DEFINITION_EXTENSIONS.find((e) => file.endsWith(e));
      if (ext) ids.add(file.slice(0, -ext.length));
    }
    return [...ids].sort();
  }

  /** Definition file for `id`, `.yaml` preferred over `.yml`; null when neither exists. */
  pathFor(id: string): string | null {
    if (!CONTAINER_ID_RE.test(id)) {
      throw new DefinitionError(`Invalid container id "${id}"`);
    }
    for (const ext of DEFINITION_EXTENSIONS) {
      const candidate = path.join(this.definitionsDir, `${id}${ext}`);
      if (fs.existsSync(candidate)) return candidate;
    }
    return null;
  }
}
