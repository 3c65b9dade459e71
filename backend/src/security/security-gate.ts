import { ok, err, Result } from "neverthrow";
import type {
  AuditEntry,
  GateDecision,
  Plan,
  SecurityDecision,
  StepRisk,
} from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import { applyRiskScores, type PlanStatusError } from "../domain/plan.js";
import { RiskExceededError, type AuditIntegrityError } from "../domain/errors.js";
import type { StoreError } from "../store/interface.js";
import type { AuditLog } from "./audit-log.js";
import type { ConfirmationError, ConfirmationTokens } from "./confirmation.js";
import {
  aggregateRisk,
  scoreStep,
  type RiskConfig,
  type RiskSignalSource,
} from "./risk.js";

// ─── Types ──────────────────────────────────────────────

export interface GateEvaluation {
  decision: SecurityDecision;
  /** The plan with per-step and aggregate scores filled in. */
  plan: Plan;
}

export interface Confirmed {
  planId: string;
  entry: AuditEntry;
}

// ─── Security Gate ──────────────────────────────────────

export class SecurityGate {
  private readonly evaluations = new Map<string, GateEvaluation>();
  private readonly latestByTask = new Map<string, GateEvaluation>();

  constructor(
    private readonly config: RiskConfig,
    private readonly audit: AuditLog,
    private readonly tokens: ConfirmationTokens,
    private readonly signals: RiskSignalSource | null = null,
  ) {}

  /**
   * Scores the plan and records the decision. Evaluating the same plan
   * again returns the first decision without writing a second audit entry.
   */
  async evaluate(
    plan: Plan,
  ): Promise<Result<GateEvaluation, StoreError | PlanStatusError>> {
    const cached = this.evaluations.get(plan.id);
    if (cached) return ok(cached);

    const stepRisks = plan.steps.map((s) => scoreStep(s, this.config, this.signals));
    const aggregate = aggregateRisk(
      stepRisks.map((r) => r.score),
      this.config.tieBreakWeight,
    );
    const scored = applyRiskScores(
      plan,
      new Map(stepRisks.map((r): [string, number] => [r.stepId, r.score])),
      aggregate,
    );
    if (scored.isErr()) return err(scored.error);

    const riskiest = this.riskiest(stepRisks);
    const { decision, reason } = this.decide(scored.value, stepRisks, aggregate);

    if (decision !== "CONFIRMATION_REQUIRED") {
      const entry = await this.audit.append({
        taskId: plan.taskId,
        stepId: riskiest?.stepId ?? null,
        actor: AGENT_IDS.security,
        action: "plan:evaluate",
        riskScore: aggregate,
        decision,
      });
      if (entry.isErr()) return err(entry.error);
    }

    const evaluation: GateEvaluation = {
      plan: scored.value,
      decision: {
        taskId: plan.taskId,
        planId: plan.id,
        decision,
        aggregateRiskScore: aggregate,
        stepRisks,
        reason,
        confirmation:
          decision === "CONFIRMATION_REQUIRED"
            ? this.tokens.issue(plan.taskId, plan.id)
            : null,
      },
    };
    this.evaluations.set(plan.id, evaluation);
    this.latestByTask.set(plan.taskId, evaluation);
    return ok(evaluation);
  }

  async confirm(
    taskId: string,
    token: string,
  ): Promise<Result<Confirmed, ConfirmationError | StoreError>> {
    const consumed = this.tokens.consume(taskId, token);
    if (consumed.isErr()) return err(consumed.error);

    const evaluation = this.latestByTask.get(taskId);
    const entry = await this.audit.append({
      taskId,
      stepId: null,
      actor: AGENT_IDS.user,
      action: "plan:confirm",
      riskScore: evaluation?.decision.aggregateRiskScore ?? 0,
      decision: "CONFIRMED",
    });
    if (entry.isErr()) return err(entry.error);
    return ok({ planId: consumed.value, entry: entry.value });
  }

  /**
   * Expires the task's pending token and records the rejection. Returns
   * false when there was nothing to expire (already confirmed or expired).
   * `orphaned` records the rejection even without a live token, for tasks
   * whose token was lost with a previous process.
   */
  expire(taskId: string, orphaned = false): Promise<Result<boolean, StoreError>> {
    return this.closePending(taskId, "plan:confirmation-timeout", orphaned);
  }

  /** Drops a pending confirmation because the task was cancelled. */
  withdraw(taskId: string): Promise<Result<boolean, StoreError>> {
    return this.closePending(taskId, "plan:withdrawn");
  }

  pendingConfirmation(taskId: string): { planId: string; expiresAt: string } | null {
    return this.tokens.pending(taskId);
  }

  verify(taskId: string): Promise<Result<AuditEntry[], AuditIntegrityError | StoreError>> {
    return this.audit.verify(taskId);
  }

  // ── Private Helpers ─────────────────────────────────

  private async closePending(
    taskId: string,
    action: string,
    force = false,
  ): Promise<Result<boolean, StoreError>> {
    if (!this.tokens.expire(taskId) && !force) return ok(false);
    const evaluation = this.latestByTask.get(taskId);
    const entry = await this.audit.append({
      taskId,
      stepId: null,
      actor: AGENT_IDS.security,
      action,
      riskScore: evaluation?.decision.aggregateRiskScore ?? 0,
      decision: "REJECTED",
    });
    if (entry.isErr()) return err(entry.error);
    return ok(true);
  }

  private decide(
    plan: Plan,
    stepRisks: readonly StepRisk[],
    aggregate: number,
  ): { decision: GateDecision; reason: string | null } {
    const { lowThreshold, highThreshold } = this.config;

    const blocking = stepRisks.find((r) => r.score >= highThreshold);
    if (blocking || aggregate >= highThreshold) {
      const error = new RiskExceededError(
        blocking?.score ?? aggregate,
        highThreshold,
        blocking?.stepId ?? null,
      );
      return { decision: "REJECTED", reason: error.message };
    }

    const hasHighStep = plan.steps.some((s) => s.riskLevel === "HIGH");
    if (aggregate < lowThreshold && !hasHighStep) {
      return { decision: "AUTO_APPROVED", reason: null };
    }
    return {
      decision: "CONFIRMATION_REQUIRED",
      reason: hasHighStep
        ? "plan contains a HIGH risk step"
        : `plan risk ${aggregate.toFixed(3)} requires confirmation`,
    };
  }

  private riskiest(stepRisks: readonly StepRisk[]): StepRisk | undefined {
    let top: StepRisk | undefined;
    for (const r of stepRisks) {
      if (!top || r.score > top.score) top = r;
    }
    return top;
  }
}
