import type { SymbolIndex } from "../symbolIndex.js";
import type { DependencyDirection, DependencyLayer, DependencyReach } from "../types.js";
import type { ImportGraph } from "./graph.js";

export const DEFAULT_MAX_HOPS = 10;

type ReachSource = Pick<SymbolIndex, "graph" | "importsByFile">;

function neighbours(graph: ImportGraph, file: string, direction: DependencyDirection): string[] {
  const next = direction === "imports" ? graph.importsOf(file) : graph.importedBy(file);
  return [...next].sort();
}

function externalModules(source: ReachSource, file: string): string[] {
  const modules = new Set<string>();
  for (const spec of source.importsByFile.get(file) ?? []) {
    if (!spec.isRelative && spec.module) modules.add(spec.module);
  }
  return [...modules].sort();
}

/**
 * Breadth-first walk of the import graph from `file`. A file is listed
 * once, in the layer of its shortest hop count; the starting file is
 * never listed, even when a cycle leads back to it.
 */
export function dependencyReach(
  source: ReachSource,
  file: string,
  direction: DependencyDirection = "imports",
  maxHops = DEFAULT_MAX_HOPS,
): DependencyReach {
  const limit = Number.isFinite(maxHops) ? Math.max(1, Math.floor(maxHops)) : DEFAULT_MAX_HOPS;
  const seen = new Set<string>([file]);
  const layers: DependencyLayer[] = [];
  let frontier = [file];

  for (let hop = 1; hop <= limit && frontier.length > 0; hop += 1) {
    const reached: string[] = [];
    for (const current of frontier) {
      for (const next of neighbours(source.graph, current, direction)) {
        if (seen.has(next)) continue;
        seen.add(next);
        reached.push(next);
      }
    }
    if (reached.length > 0) layers.push({ hop, files: reached.sort() });
    frontier = reached;
  }

  const truncated = frontier.some((current) =>
    neighbours(source.graph, current, direction).some((next) => !seen.has(next)),
  );

  return {
    file,
    direction,
    layers,
    external: direction === "imports" ? externalModules(source, file) : [],
    truncated,
  };
}

/**
 * Import cycles as strongly connected components of two or more files.
 * Members are sorted; components are ordered by their first member.
 */
export function importCycles(graph: ImportGraph): string[][] {
  const order = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const components: string[][] = [];
  let counter = 0;

  // Returns the lowest order reachable from `file` through the stack.
  const connect = (file: string): number => {
    const own = counter;
    counter += 1;
    order.set(file, own);
    stack.push(file);
    onStack.add(file);

    let lowest = own;
    for (const dep of [...graph.importsOf(file)].sort()) {
      const visited = order.get(dep);
      if (visited === undefined) {
        lowest = Math.min(lowest, connect(dep));
      } else if (onStack.has(dep)) {
        lowest = Math.min(lowest, visited);
      }
    }

    if (lowest === own) {
      const component: string[] = [];
      let member = stack.pop();
      while (member !== undefined) {
        onStack.delete(member);
        component.push(member);
        if (member === file) break;
        member = stack.pop();
      }
      if (component.length > 1) components.push(component.sort());
    }
    return lowest;
  };

  for (const file of graph.nodes()) {
    if (!order.has(file)) connect(file);
  }

  return components.sort((a, b) => a[0].localeCompare(b[0]));
}

/** Files sharing an import cycle with `file`, itself included; empty when none. */
export function cycleContaining(graph: ImportGraph, file: string): string[] {
  return importCycles(graph).find((component) => component.includes(file)) ?? [];
}
