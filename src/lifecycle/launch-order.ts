import { CycleError, MissingDependencyError } from "./errors.js";

/** What the resolver needs to know about a container. */
export interface RequirementNode {
  readonly id: string;
  readonly name: string;
  readonly requires: readonly string[];
  exists(): Promise<boolean>;
}

export interface RequirementLookup {
  get(id: string): RequirementNode;
}

/**
 * Map every id reachable from `roots` to a copy of its own `requires`.
 * Repeats until a pass discovers no new id.
 */
export function buildRequirementGraph(roots: readonly string[], lookup: RequirementLookup): Map<string, string[]> {
  const graph = new Map<string, string[]>();
  for (const id of roots) {
    if (!graph.has(id)) graph.set(id, [...lookup.get(id).requires]);
  }

  let changed = true;
  while (changed) {
    changed = false;
    for (const requirements of [...graph.values()]) {
      for (const id of requirements) {
        if (!graph.has(id)) {
          graph.set(id, [...lookup.get(id).requires]);
          changed = true;
        }
      }
    }
  }
  return graph;
}

/**
 * Order the transitive requirements of `root` so that every container comes
 * after all of its own requirements. The root itself is not included.
 * Among containers that are ready at the same time the first discovered wins.
 */
export function computeLaunchOrder(root: Pick<RequirementNode, "requires">, lookup: RequirementLookup): string[] {
  const graph = buildRequirementGraph(root.requires, lookup);
  const order: string[] = [];

  while (graph.size > 0) {
    let launchable: string | undefined;
    for (const [id, remaining] of graph) {
      if (remaining.length === 0) {
        launchable = id;
        break;
      }
    }
    if (launchable === undefined) {
      throw new CycleError([...graph.keys()]);
    }

    order.push(launchable);
    graph.delete(launchable);
    const done = launchable;
    for (const [id, remaining] of graph) {
      if (remaining.includes(done)) {
        graph.set(
          id,
          remaining.filter((r) => r !== done),
        );
      }
    }
  }

  return order;
}

/**
 * Launch order for `root`, checked against the runtime: every container in
 * it must already exist.
 */
export async function resolveLaunchOrder(
  root: Pick<RequirementNode, "requires">,
  lookup: RequirementLookup,
): Promise<string[]> {
  const order = computeLaunchOrder(root, lookup);
  for (const id of order) {
    const node = lookup.get(id);
    if (!(await node.exists())) {
      throw new MissingDependencyError(node.id, node.name);
    }
  }
  return order;
}
