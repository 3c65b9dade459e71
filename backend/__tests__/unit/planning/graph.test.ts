import * as fc from "fast-check";
import { describe, it, expect } from "vitest";
import type { StepDraft } from "@intentflow/shared";
import {
  checkReferences,
  criticalPathMs,
  findCycle,
  topologicalOrder,
  type GraphNode,
} from "../../../src/planning/graph.js";
import { RuleIndex } from "../../../src/planning/action-rules.js";
import { Planner } from "../../../src/planning/planner.js";
import { action } from "../helpers/fixtures.js";

/** Random DAGs: node i may only depend on nodes before it. */
const dagArb = fc
  .array(fc.array(fc.nat({ max: 100 }), { maxLength: 3 }), { minLength: 1, maxLength: 12 })
  .map((raw): GraphNode[] =>
    raw.map((picks, i) => ({
      key: `k${i}`,
      dependsOn: i === 0 ? [] : [...new Set(picks.map((p) => `k${p % i}`))],
    })),
  );

function positions(nodes: readonly GraphNode[]): Map<string, number> {
  return new Map(nodes.map((n, i): [string, number] => [n.key, i]));
}

describe("plan graph", () => {
  it("should order every random DAG with dependencies first", () => {
    fc.assert(
      fc.property(dagArb, (nodes) => {
        const shuffled = [...nodes].reverse();
        expect(findCycle(shuffled)).toBeNull();

        const ordered = topologicalOrder(shuffled);
        expect(ordered.isOk()).toBe(true);
        if (ordered.isOk()) {
          const at = positions(ordered.value);
          for (const node of ordered.value) {
            for (const dep of node.dependsOn) {
              expect(at.get(dep) ?? Infinity).toBeLessThan(at.get(node.key) ?? -1);
            }
          }
        }
      }),
    );
  });

  it("should detect a cycle made by adding a back edge", () => {
    fc.assert(
      fc.property(dagArb, (nodes) => {
        const withDep = nodes.find((n) => n.dependsOn.length > 0);
        fc.pre(withDep !== undefined);
        if (!withDep) return;
        const target = withDep.dependsOn[0];
        const cyclic = nodes.map((n) =>
          n.key === target ? { ...n, dependsOn: [...n.dependsOn, withDep.key] } : n,
        );

        const cycle = findCycle(cyclic);
        expect(cycle).not.toBeNull();
        expect(cycle?.[0]).toBe(cycle?.at(-1));
        expect(topologicalOrder(cyclic).isErr()).toBe(true);
      }),
    );
  });

  it("should reject duplicate keys and unknown references", () => {
    const dup = checkReferences([
      { key: "a", dependsOn: [] },
      { key: "a", dependsOn: [] },
    ]);
    expect(dup.isErr() && dup.error.message).toBe('Duplicate step key "a"');

    const unknown = checkReferences([{ key: "a", dependsOn: ["ghost"] }]);
    expect(unknown.isErr() && unknown.error.message).toBe(
      'Step "a" depends on unknown step "ghost"',
    );
  });

  it("should compute the critical path through parallel branches", () => {
    const nodes = [
      { key: "a", dependsOn: [], ms: 100 },
      { key: "b", dependsOn: ["a"], ms: 300 },
      { key: "c", dependsOn: ["a"], ms: 50 },
      { key: "d", dependsOn: ["b", "c"], ms: 10 },
    ];
    expect(criticalPathMs(nodes, (n) => n.ms)).toBe(410);
  });

  it("should only accept plans whose steps follow their dependencies", () => {
    const rules = new RuleIndex({ stopwords: [], rules: [] });
    const planner = new Planner(
      { defaultRetry: { maxAttempts: 3, backoffBaseMs: 500 } },
      rules,
      { canHandle: () => true },
    );

    fc.assert(
      fc.property(dagArb, (nodes) => {
        const drafts: StepDraft[] = [...nodes].reverse().map((n) => ({
          key: n.key,
          dependsOn: [...n.dependsOn],
          action: action(`act_${n.key}`),
          riskLevel: "LOW",
          sideEffects: false,
          compensatingAction: null,
          parallelSafe: true,
          estimatedDurationMs: 100,
        }));

        const built = planner.buildPlan({ id: "task-1", planVersion: 0 }, drafts, {
          contextDegraded: false,
          supersedes: null,
        });
        expect(built.isOk()).toBe(true);
        if (built.isOk()) {
          const index = new Map(built.value.steps.map((s): [string, number] => [s.id, s.sequenceIndex]));
          for (const s of built.value.steps) {
            for (const dep of s.dependsOn) {
              expect(index.get(dep) ?? Infinity).toBeLessThan(s.sequenceIndex);
            }
          }
        }
      }),
    );
  });
});
