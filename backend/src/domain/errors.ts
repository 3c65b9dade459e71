import type { CompensationFailure, ErrorCode } from "@intentflow/shared";

// ─── Base ───────────────────────────────────────────────

/**
 * Every orchestration failure carries a stable `code` so it can be
 * surfaced to callers without leaking stack traces.
 */
export abstract class OrchestrationError extends Error {
  abstract readonly code: ErrorCode;
  readonly stepId: string | null;

  constructor(message: string, stepId: string | null = null) {
    super(message);
    this.stepId = stepId;
  }
}

// ─── Planning ───────────────────────────────────────────

export class PlanCycleError extends OrchestrationError {
  readonly code = "PlanCycleError" as const;

  constructor(public readonly cycle: readonly string[]) {
    super(`Plan contains a dependency cycle: ${cycle.join(" -> ")}`);
    this.name = "PlanCycleError";
  }
}

export class MissingCompensationError extends OrchestrationError {
  readonly code = "MissingCompensationError" as const;

  constructor(stepKey: string) {
    super(
      `Step ${stepKey} has side effects and risk >= MEDIUM but defines no compensating action`,
      stepKey,
    );
    this.name = "MissingCompensationError";
  }
}

export class PlanValidationError extends OrchestrationError {
  readonly code = "PlanValidationError" as const;

  constructor(message: string, stepKey: string | null = null) {
    super(message, stepKey);
    this.name = "PlanValidationError";
  }
}

export class UnsupportedActionError extends OrchestrationError {
  readonly code = "UnsupportedActionError" as const;

  constructor(actionName: string, category: string, stepKey: string | null = null) {
    super(
      `No executor registered for action "${actionName}" (category ${category})`,
      stepKey,
    );
    this.name = "UnsupportedActionError";
  }
}

export type PlanningError =
  | PlanCycleError
  | MissingCompensationError
  | PlanValidationError
  | UnsupportedActionError;

// ─── Security ───────────────────────────────────────────

export class RiskExceededError extends OrchestrationError {
  readonly code = "RiskExceeded" as const;

  constructor(
    public readonly riskScore: number,
    public readonly threshold: number,
    stepId: string | null,
  ) {
    super(
      `Plan risk ${riskScore.toFixed(3)} exceeds high threshold ${threshold}`,
      stepId,
    );
    this.name = "RiskExceededError";
  }
}

export class ConfirmationTimeoutError extends OrchestrationError {
  readonly code = "ConfirmationTimeout" as const;

  constructor(taskId: string) {
    super(`Confirmation for task ${taskId} expired before it was given`);
    this.name = "ConfirmationTimeoutError";
  }
}

export class AuditIntegrityError extends OrchestrationError {
  readonly code = "AuditIntegrityError" as const;

  constructor(
    public readonly taskId: string,
    public readonly sequence: number,
  ) {
    super(`Audit chain for task ${taskId} is broken at entry ${sequence}`);
    this.name = "AuditIntegrityError";
  }
}

// ─── Execution ──────────────────────────────────────────

export class StepExecutionError extends OrchestrationError {
  readonly code = "StepExecutionError" as const;

  constructor(
    message: string,
    stepId: string | null = null,
    public readonly retryable = true,
  ) {
    super(message, stepId);
    this.name = "StepExecutionError";
  }
}

export class RollbackFailure extends OrchestrationError {
  readonly code = "RollbackFailure" as const;

  constructor(public readonly failures: readonly CompensationFailure[]) {
    super(
      `${failures.length} compensation(s) failed: ${failures.map((f) => f.stepId).join(", ")}`,
    );
    this.name = "RollbackFailure";
  }
}

export class DuplicateMessageIgnored extends OrchestrationError {
  readonly code = "DuplicateMessageIgnored" as const;

  constructor(public readonly key: string) {
    super(`Result ${key} was already applied`);
    this.name = "DuplicateMessageIgnored";
  }
}

// ─── Memory ─────────────────────────────────────────────

export class MemoryUnavailableError extends OrchestrationError {
  readonly code = "MemoryUnavailable" as const;

  constructor(reason: string) {
    super(`Memory store unavailable: ${reason}`);
    this.name = "MemoryUnavailableError";
  }
}
