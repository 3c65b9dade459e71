import type {
  ActionCategory,
  ActionDescriptor,
  Plan,
  Step,
  StepOutcome,
  StepResult,
  StepResultKind,
} from "@intentflow/shared";

export function action(
  name: string,
  category: ActionCategory = "read",
  target = "report",
): ActionDescriptor {
  return {
    name,
    label: `${name} ${target}`,
    category,
    target,
    sensitivity: "internal",
    parameters: {},
  };
}

export interface StepOptions {
  dependsOn?: string[];
  category?: ActionCategory;
  compensate?: boolean;
  parallelSafe?: boolean;
  maxAttempts?: number;
}

export function step(id: string, index: number, options: StepOptions = {}): Step {
  const category = options.category ?? "write";
  return {
    id,
    planId: "plan-1",
    sequenceIndex: index,
    dependsOn: options.dependsOn ?? [],
    action: action(`do_${id}`, category),
    riskLevel: "LOW",
    riskScore: 0.1,
    sideEffects: options.compensate ?? false,
    compensatingAction: options.compensate ? action(`undo_${id}`, category) : null,
    retryPolicy: { maxAttempts: options.maxAttempts ?? 3, backoffBaseMs: 100 },
    parallelSafe: options.parallelSafe ?? false,
    estimatedDurationMs: 1000,
  };
}

export function plan(steps: Step[], taskId = "task-1"): Plan {
  return {
    id: "plan-1",
    taskId,
    version: 1,
    status: "ACCEPTED",
    steps,
    estimatedDurationMs: steps.length * 1000,
    aggregateRiskScore: 0.1,
    contextDegraded: false,
    supersedes: null,
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

/** Sequential chain s1 <- s2 <- ... <- sN. */
export function chain(n: number, options: Omit<StepOptions, "dependsOn"> = {}): Step[] {
  return Array.from({ length: n }, (_, i) =>
    step(`s${i + 1}`, i, { ...options, dependsOn: i === 0 ? [] : [`s${i}`] }),
  );
}

export function result(
  stepId: string,
  attempt: number,
  outcome: StepOutcome = "SUCCESS",
  kind: StepResultKind = "action",
  taskId = "task-1",
): StepResult {
  return {
    taskId,
    stepId,
    attempt,
    kind,
    outcome,
    output: {},
    error: outcome === "SUCCESS" ? null : `${stepId} broke`,
    retryable: outcome !== "SUCCESS",
    category: "write",
    sensitivity: "internal",
    durationMs: 10,
    timestamp: "2026-01-01T00:00:01.000Z",
  };
}
