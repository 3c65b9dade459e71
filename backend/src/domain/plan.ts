import { ok, err, Result } from "neverthrow";
import type { Plan, PlanStatus, PlanSummary, Step } from "@intentflow/shared";

// ─── Errors ─────────────────────────────────────────────

export class PlanStatusError extends Error {
  constructor(
    public readonly from: PlanStatus,
    public readonly to: PlanStatus,
  ) {
    super(`Invalid plan status change: ${from} -> ${to}`);
    this.name = "PlanStatusError";
  }
}

// ─── Status ─────────────────────────────────────────────

const PLAN_TRANSITIONS: Record<PlanStatus, readonly PlanStatus[]> = {
  PROPOSED: ["ACCEPTED", "REJECTED"],
  // Steps and scores are frozen once accepted; superseding is the only change.
  ACCEPTED: ["SUPERSEDED"],
  SUPERSEDED: [],
  REJECTED: [],
};

export function changePlanStatus(
  plan: Plan,
  to: PlanStatus,
): Result<Plan, PlanStatusError> {
  if (!PLAN_TRANSITIONS[plan.status].includes(to)) {
    return err(new PlanStatusError(plan.status, to));
  }
  return ok({ ...plan, status: to });
}

/**
 * Writes the gate's scores into a proposed plan. Only valid before
 * acceptance.
 */
export function applyRiskScores(
  plan: Plan,
  stepScores: ReadonlyMap<string, number>,
  aggregateRiskScore: number,
): Result<Plan, PlanStatusError> {
  if (plan.status !== "PROPOSED") {
    return err(new PlanStatusError(plan.status, plan.status));
  }
  return ok({
    ...plan,
    aggregateRiskScore,
    steps: plan.steps.map((step) => ({
      ...step,
      riskScore: stepScores.get(step.id) ?? step.riskScore,
    })),
  });
}

// ─── Queries ────────────────────────────────────────────

export function findStep(plan: Plan, stepId: string): Step | undefined {
  return plan.steps.find((s) => s.id === stepId);
}

export function summarizePlan(plan: Plan): PlanSummary {
  return {
    planId: plan.id,
    version: plan.version,
    status: plan.status,
    aggregateRiskScore: plan.aggregateRiskScore,
    estimatedDurationMs: plan.estimatedDurationMs,
    contextDegraded: plan.contextDegraded,
    steps: plan.steps.map((s) => ({
      id: s.id,
      label: s.action.label,
      category: s.action.category,
      riskLevel: s.riskLevel,
      riskScore: s.riskScore,
      dependsOn: s.dependsOn,
    })),
  };
}
