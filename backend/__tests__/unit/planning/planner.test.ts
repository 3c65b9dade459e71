import { describe, it, expect } from "vitest";
import * as path from "node:path";
import type { RankedMemoryNode, StepDraft } from "@intentflow/shared";
import { loadActionRules, RuleIndex } from "../../../src/planning/action-rules.js";
import { Planner, splitClauses } from "../../../src/planning/planner.js";
import { queryTermsOf } from "../../../src/planning/planning-agent.js";
import { action } from "../helpers/fixtures.js";

const rulesPath = path.resolve(import.meta.dirname, "../../../../config/action-rules.yaml");

function loadRules(): RuleIndex {
  const loaded = loadActionRules(rulesPath);
  if (loaded.isErr()) throw loaded.error;
  return new RuleIndex(loaded.value);
}

function createPlanner(canHandle = true): Planner {
  return new Planner(
    { defaultRetry: { maxAttempts: 3, backoffBaseMs: 500 } },
    loadRules(),
    { canHandle: () => canHandle },
  );
}

function contextNode(name: string, classification: string): RankedMemoryNode {
  return {
    entity: {
      id: `entity:${name}`,
      type: "document",
      name,
      properties: { classification },
      keywords: [],
      contextRoles: [],
      confidence: 1,
      version: 1,
      createdAt: "2026-01-01T00:00:00.000Z",
      updatedAt: "2026-01-01T00:00:00.000Z",
    },
    relevanceScore: 1,
    recency: 1,
    sourceContext: "test",
  };
}

function draft(key: string, overrides: Partial<StepDraft> = {}): StepDraft {
  return {
    key,
    dependsOn: [],
    action: action(`act_${key}`, "write"),
    riskLevel: "LOW",
    sideEffects: false,
    compensatingAction: null,
    parallelSafe: false,
    estimatedDurationMs: 100,
    ...overrides,
  };
}

describe("Planner", () => {
  // ── Decomposition ─────────────────────────────────

  it("should split an intent into clauses", () => {
    expect(splitClauses("open the file, then summarize it; and email Bob")).toEqual([
      "open the file",
      "summarize it",
      "email Bob",
    ]);
  });

  it("should decompose the quarterly report intent into three ordered steps", () => {
    const planner = createPlanner();
    const drafts = planner.decompose("open quarterly report and email summary", []);

    expect(drafts.isOk()).toBe(true);
    if (!drafts.isOk()) return;
    expect(drafts.value.map((d) => d.key)).toEqual([
      "1-open_file",
      "2-extract_summary",
      "3-compose_email",
    ]);
    expect(drafts.value.map((d) => d.dependsOn)).toEqual([
      [],
      ["1-open_file"],
      ["2-extract_summary"],
    ]);
    expect(drafts.value.map((d) => d.action.label)).toEqual([
      "Open quarterly report",
      "Extract summary of quarterly report",
      "Compose email with summary of quarterly report",
    ]);

    const email = drafts.value[2];
    expect(email?.riskLevel).toBe("MEDIUM");
    expect(email?.sideEffects).toBe(true);
    expect(email?.compensatingAction?.name).toBe("discard_draft");
    expect(drafts.value[0]?.compensatingAction).toBeNull();
  });

  it("should let consecutive reads share their dependencies", () => {
    const drafts = createPlanner().decompose("open report, search invoices", []);
    expect(drafts.isOk() && drafts.value.map((d) => d.dependsOn)).toEqual([[], []]);
  });

  it("should take a target's classification from context", () => {
    const drafts = createPlanner().decompose("open quarterly report", [
      contextNode("quarterly report", "confidential"),
    ]);
    expect(drafts.isOk() && drafts.value[0]?.action.sensitivity).toBe("confidential");
  });

  it("should fail when no rule matches a clause", () => {
    const drafts = createPlanner().decompose("dance wildly", []);
    expect(drafts.isErr()).toBe(true);
    if (drafts.isErr()) {
      expect(drafts.error.code).toBe("PlanValidationError");
      expect(drafts.error.message).toBe('No action rule matches "dance wildly"');
    }
  });

  it("should drop stopwords from memory query terms", () => {
    const stopwords = loadRules().stopwords;
    expect(queryTermsOf("Open the quarterly report for my team", stopwords)).toEqual([
      "open",
      "quarterly",
      "report",
      "team",
    ]);
  });

  // ── Validation ────────────────────────────────────

  it("should build a proposed plan with defaults and prefixed step ids", () => {
    const built = createPlanner().buildPlan(
      { id: "task-1", planVersion: 0 },
      [draft("a"), draft("b", { dependsOn: ["a"], retryPolicy: { maxAttempts: 5 } })],
      { contextDegraded: true, supersedes: null },
    );

    expect(built.isOk()).toBe(true);
    if (!built.isOk()) return;
    const plan = built.value;
    expect(plan.status).toBe("PROPOSED");
    expect(plan.version).toBe(1);
    expect(plan.contextDegraded).toBe(true);
    expect(plan.estimatedDurationMs).toBe(200);
    expect(plan.steps.map((s) => s.id)).toEqual([`${plan.id}:a`, `${plan.id}:b`]);
    expect(plan.steps[1]?.dependsOn).toEqual([`${plan.id}:a`]);
    expect(plan.steps[1]?.retryPolicy).toEqual({ maxAttempts: 5, backoffBaseMs: 500 });
  });

  it("should reject a side-effecting medium-risk step without compensation", () => {
    const built = createPlanner().buildPlan(
      { id: "task-1", planVersion: 0 },
      [draft("a", { riskLevel: "MEDIUM", sideEffects: true })],
      { contextDegraded: false, supersedes: null },
    );
    expect(built.isErr() && built.error.code).toBe("MissingCompensationError");
  });

  it("should reject a cyclic plan", () => {
    const built = createPlanner().buildPlan(
      { id: "task-1", planVersion: 0 },
      [draft("a", { dependsOn: ["b"] }), draft("b", { dependsOn: ["a"] })],
      { contextDegraded: false, supersedes: null },
    );
    expect(built.isErr() && built.error.code).toBe("PlanCycleError");
  });

  it("should reject an action no executor can handle", () => {
    const built = createPlanner(false).buildPlan(
      { id: "task-1", planVersion: 0 },
      [draft("a")],
      { contextDegraded: false, supersedes: null },
    );
    expect(built.isErr() && built.error.code).toBe("UnsupportedActionError");
  });
});
