import { ok, err, Result } from "neverthrow";
import {
  PlanCycleError,
  PlanValidationError,
} from "../domain/errors.js";

// ─── Types ──────────────────────────────────────────────

export interface GraphNode {
  key: string;
  dependsOn: readonly string[];
}

// ─── Validation ─────────────────────────────────────────

/** Rejects duplicate keys and references to keys that are not in the set. */
export function checkReferences(
  nodes: readonly GraphNode[],
): Result<void, PlanValidationError> {
  const keys = new Set<string>();
  for (const node of nodes) {
    if (keys.has(node.key)) {
      return err(
        new PlanValidationError(`Duplicate step key "${node.key}"`, node.key),
      );
    }
    keys.add(node.key);
  }
  for (const node of nodes) {
    for (const dep of node.dependsOn) {
      if (!keys.has(dep)) {
        return err(
          new PlanValidationError(
            `Step "${node.key}" depends on unknown step "${dep}"`,
            node.key,
          ),
        );
      }
    }
  }
  return ok(undefined);
}

/**
 * Returns a dependency cycle as a closed path (`[a, b, a]`), or null.
 * Assumes references were checked.
 */
export function findCycle(nodes: readonly GraphNode[]): string[] | null {
  const byKey = new Map<string, GraphNode>(nodes.map((n) => [n.key, n]));
  const state = new Map<string, "visiting" | "done">();
  const stack: string[] = [];

  const visit = (key: string): string[] | null => {
    const mark = state.get(key);
    if (mark === "done") return null;
    if (mark === "visiting") {
      return [...stack.slice(stack.indexOf(key)), key];
    }
    state.set(key, "visiting");
    stack.push(key);
    for (const dep of byKey.get(key)?.dependsOn ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    state.set(key, "done");
    return null;
  };

  for (const node of nodes) {
    const cycle = visit(node.key);
    if (cycle) return cycle;
  }
  return null;
}

// ─── Ordering ───────────────────────────────────────────

/**
 * Kahn's algorithm. Among ready nodes the one earliest in the input wins,
 * so independent steps keep the order they were drafted in.
 */
export function topologicalOrder<T extends GraphNode>(
  nodes: readonly T[],
): Result<T[], PlanCycleError> {
  const remaining = new Map<string, Set<string>>(nodes.map((n) => [n.key, new Set(n.dependsOn)]));
  const ordered: T[] = [];

  while (ordered.length < nodes.length) {
    const next = nodes.find((n) => remaining.get(n.key)?.size === 0);
    if (!next) {
      return err(new PlanCycleError(findCycle(nodes) ?? []));
    }
    ordered.push(next);
    remaining.delete(next.key);
    for (const deps of remaining.values()) {
      deps.delete(next.key);
    }
  }
  return ok(ordered);
}

/** Longest path through the DAG, weighting each node by its duration. */
export function criticalPathMs<T extends GraphNode>(
  ordered: readonly T[],
  duration: (node: T) => number,
): number {
  const finish = new Map<string, number>();
  let longest = 0;
  for (const node of ordered) {
    let start = 0;
    for (const dep of node.dependsOn) {
      start = Math.max(start, finish.get(dep) ?? 0);
    }
    const end = start + duration(node);
    finish.set(node.key, end);
    longest = Math.max(longest, end);
  }
  return longest;
}
