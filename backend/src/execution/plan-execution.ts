import { ok, err, Result } from "neverthrow";
import type {
  ActionDescriptor,
  CompensationCompleteness,
  CompensationFailure,
  ErrorCode,
  Plan,
  Step,
  StepOutcome,
  StepResult,
  StepResultKind,
  TaskFailure,
  TaskOutcome,
} from "@intentflow/shared";
import { DuplicateMessageIgnored } from "../domain/errors.js";
import { keyOf } from "../domain/step-result.js";
import { decideRetry } from "./retry-policy.js";

// ─── Types ──────────────────────────────────────────────

export type ExecutionPhase =
  | "PENDING"
  | "RUNNING"
  | "RETRYING"
  | "ROLLING_BACK"
  | "COMPLETED"
  | "FAILED"
  | "CANCELLED";

export type TerminalPhase = "COMPLETED" | "FAILED" | "CANCELLED";

export type ExecutionEffect =
  | {
      type: "dispatch";
      stepId: string;
      attempt: number;
      kind: StepResultKind;
      action: ActionDescriptor;
    }
  | { type: "schedule_retry"; stepId: string; attempt: number; delayMs: number }
  | { type: "abort"; stepIds: string[] }
  | { type: "phase_changed"; from: ExecutionPhase; to: ExecutionPhase }
  | { type: "step_succeeded"; stepId: string; attempt: number }
  | { type: "late_success"; stepId: string; attempt: number }
  | { type: "step_failed"; stepId: string; attempt: number; error: string; willRetry: boolean }
  | { type: "compensated"; stepId: string; succeeded: boolean; error: string | null }
  | { type: "ignored"; key: string; reason: string }
  | {
      type: "finished";
      status: TerminalPhase;
      failure: TaskFailure | null;
      outcome: TaskOutcome;
    };

export interface PlanExecutionOptions {
  maxParallelSteps: number;
  backoffCapMs: number;
  now?: () => Date;
}

type StepState =
  | "pending"
  | "in_flight"
  | "waiting_retry"
  | "succeeded"
  | "failed"
  | "abandoned";

interface Halt {
  target: "FAILED" | "CANCELLED";
  code: ErrorCode;
  message: string;
  stepId: string | null;
}

const TERMINAL: ReadonlySet<ExecutionPhase> = new Set(["COMPLETED", "FAILED", "CANCELLED"]);

// ─── Plan Execution ─────────────────────────────────────

/**
 * Pure state machine for one accepted plan. Every input returns the
 * effects the caller must carry out; nothing here touches timers, the
 * bus or storage. Inputs must be fed one at a time.
 */
export class PlanExecution {
  private phase: ExecutionPhase = "PENDING";
  private readonly steps: readonly Step[];
  private readonly byId: ReadonlyMap<string, Step>;
  private readonly state = new Map<string, StepState>();
  private readonly attempts = new Map<string, number>();
  private readonly retryAt = new Map<string, { attempt: number; delayMs: number }>();
  /** Outcome applied per result key. */
  private readonly applied = new Map<string, StepOutcome>();
  /** Steps whose earlier attempt succeeded while a retry was already in flight. */
  private readonly lateSucceeded = new Set<string>();
  private readonly completionOrder: string[] = [];
  private readonly compensated: string[] = [];
  private readonly compensationFailures: CompensationFailure[] = [];
  private compensationQueue: string[] | null = null;
  private compensating: string | null = null;
  private halt: Halt | null = null;
  private last: StepResult | null = null;
  private readonly now: () => Date;

  constructor(
    readonly plan: Plan,
    private readonly options: PlanExecutionOptions,
  ) {
    this.steps = [...plan.steps].sort((a, b) => a.sequenceIndex - b.sequenceIndex);
    this.byId = new Map(this.steps.map((s): [string, Step] => [s.id, s]));
    for (const step of this.steps) {
      this.state.set(step.id, "pending");
      this.attempts.set(step.id, 0);
    }
    this.now = options.now ?? (() => new Date());
  }

  // ── Queries ─────────────────────────────────────────

  get currentPhase(): ExecutionPhase {
    return this.phase;
  }

  get isTerminal(): boolean {
    return TERMINAL.has(this.phase);
  }

  get lastResult(): StepResult | null {
    return this.last;
  }

  /** Dispatches whose results are still awaited, as `(stepId, kind, attempt)`. */
  inFlight(): Array<{ stepId: string; kind: StepResultKind; attempt: number }> {
    const list: Array<{ stepId: string; kind: StepResultKind; attempt: number }> = [];
    for (const [stepId, s] of this.state) {
      if (s === "in_flight") {
        list.push({ stepId, kind: "action", attempt: this.attempts.get(stepId) ?? 0 });
      }
    }
    if (this.compensating) {
      list.push({ stepId: this.compensating, kind: "compensation", attempt: 1 });
    }
    return list;
  }

  // ── Inputs ──────────────────────────────────────────

  start(): ExecutionEffect[] {
    if (this.phase !== "PENDING") return [];
    const effects: ExecutionEffect[] = [];
    this.setPhase("RUNNING", effects);
    this.dispatchReady(effects);
    return effects;
  }

  /**
   * Applies one result. A key seen before yields DuplicateMessageIgnored
   * and leaves the state untouched, except a SUCCESS landing after the
   * same attempt was applied as a failure or timeout: its effect happened,
   * so the step is counted as succeeded and rolled back like any other.
   */
  applyResult(result: StepResult): Result<ExecutionEffect[], DuplicateMessageIgnored> {
    const key = keyOf(result);
    const previous = this.applied.get(key);
    if (previous !== undefined) {
      if (previous === "SUCCESS" || result.outcome !== "SUCCESS") {
        return err(new DuplicateMessageIgnored(key));
      }
      this.applied.set(key, result.outcome);
      return ok(this.onLateSuccess(key, result));
    }

    const effects: ExecutionEffect[] = [];
    if (this.isTerminal) {
      this.applied.set(key, result.outcome);
      effects.push({ type: "ignored", key, reason: "execution already finished" });
      return ok(effects);
    }

    if (result.kind === "compensation") {
      if (this.compensating !== result.stepId || result.attempt !== 1) {
        effects.push({ type: "ignored", key, reason: "no such compensation in flight" });
        return ok(effects);
      }
      this.applied.set(key, result.outcome);
      this.last = result;
      this.onCompensationResult(result, effects);
      return ok(effects);
    }

    const step = this.byId.get(result.stepId);
    if (
      !step ||
      this.state.get(step.id) !== "in_flight" ||
      this.attempts.get(step.id) !== result.attempt
    ) {
      effects.push({ type: "ignored", key, reason: "no such dispatch in flight" });
      return ok(effects);
    }

    this.applied.set(key, result.outcome);
    this.last = result;
    if (result.outcome === "SUCCESS") {
      this.onActionSuccess(step, result, effects);
    } else {
      this.onActionFailure(step, result, effects);
    }
    return ok(effects);
  }

  /** Backoff timer for `(stepId, attempt)` fired. */
  retryDue(stepId: string, attempt: number): ExecutionEffect[] {
    const effects: ExecutionEffect[] = [];
    const waiting = this.retryAt.get(stepId);
    const step = this.byId.get(stepId);
    if (!step || !waiting || waiting.attempt !== attempt || this.halt || this.isTerminal) {
      return effects;
    }
    this.retryAt.delete(stepId);
    this.dispatchAction(step, attempt, effects);
    this.settlePhase(effects);
    return effects;
  }

  /**
   * Stops dispatching, drops pending retries and asks in-flight work to
   * abort. In-flight results are still awaited; succeeded steps are then
   * compensated like any other failure, ending CANCELLED.
   */
  cancel(reason: string): ExecutionEffect[] {
    const effects: ExecutionEffect[] = [];
    if (this.isTerminal) return effects;
    if (this.phase === "PENDING") {
      this.halt = { target: "CANCELLED", code: "Cancelled", message: reason, stepId: null };
      this.finish(effects);
      return effects;
    }

    const alreadyHalted = this.halt !== null;
    this.halt = {
      target: "CANCELLED",
      code: "Cancelled",
      message: reason,
      stepId: this.halt?.stepId ?? null,
    };
    if (!alreadyHalted) {
      this.abandonRemaining(effects);
      const flying = this.inFlight()
        .filter((f) => f.kind === "action")
        .map((f) => f.stepId);
      if (flying.length > 0) {
        effects.push({ type: "abort", stepIds: flying });
      }
      this.proceedWithHalt(effects);
    }
    return effects;
  }

  /**
   * After replaying stored results into a freshly started machine, returns
   * the effects that put outstanding work back in motion.
   */
  resume(): ExecutionEffect[] {
    const effects: ExecutionEffect[] = [];
    if (this.isTerminal) return effects;
    for (const f of this.inFlight()) {
      const step = this.byId.get(f.stepId);
      if (!step) continue;
      const action = f.kind === "action" ? step.action : step.compensatingAction;
      if (action) {
        effects.push({ type: "dispatch", stepId: f.stepId, attempt: f.attempt, kind: f.kind, action });
      }
    }
    for (const [stepId, waiting] of this.retryAt) {
      effects.push({
        type: "schedule_retry",
        stepId,
        attempt: waiting.attempt,
        delayMs: waiting.delayMs,
      });
    }
    return effects;
  }

  // ── Transitions ─────────────────────────────────────

  private onActionSuccess(step: Step, result: StepResult, effects: ExecutionEffect[]): void {
    this.lateSucceeded.delete(step.id);
    this.state.set(step.id, "succeeded");
    this.completionOrder.push(step.id);
    effects.push({ type: "step_succeeded", stepId: step.id, attempt: result.attempt });

    if (this.halt) {
      this.proceedWithHalt(effects);
      return;
    }

    if (this.steps.every((s) => this.state.get(s.id) === "succeeded")) {
      this.finish(effects);
      return;
    }
    this.dispatchReady(effects);
    this.settlePhase(effects);
  }

  private onActionFailure(step: Step, result: StepResult, effects: ExecutionEffect[]): void {
    if (this.lateSucceeded.has(step.id)) {
      this.onActionSuccess(step, result, effects);
      return;
    }
    const error = result.error ?? `step ${result.outcome.toLowerCase()}`;
    const retryable = result.outcome === "TIMEOUT" || result.retryable;
    const decision = decideRetry(step.retryPolicy, result.attempt, retryable, this.options.backoffCapMs);

    if (decision.shouldRetry && !this.halt) {
      this.state.set(step.id, "waiting_retry");
      this.retryAt.set(step.id, { attempt: decision.nextAttempt, delayMs: decision.delayMs });
      effects.push({ type: "step_failed", stepId: step.id, attempt: result.attempt, error, willRetry: true });
      effects.push({
        type: "schedule_retry",
        stepId: step.id,
        attempt: decision.nextAttempt,
        delayMs: decision.delayMs,
      });
      this.settlePhase(effects);
      return;
    }

    this.state.set(step.id, "failed");
    effects.push({ type: "step_failed", stepId: step.id, attempt: result.attempt, error, willRetry: false });

    if (!this.halt) {
      this.halt = {
        target: "FAILED",
        code: "StepExecutionError",
        message: `Step "${step.action.label}" failed after ${result.attempt} attempt(s): ${error}`,
        stepId: step.id,
      };
      this.abandonRemaining(effects);
    }
    this.proceedWithHalt(effects);
  }

  private onLateSuccess(key: string, result: StepResult): ExecutionEffect[] {
    const effects: ExecutionEffect[] = [];
    if (this.isTerminal) {
      effects.push({ type: "ignored", key, reason: "effect landed after execution finished" });
      return effects;
    }
    this.last = result;

    if (result.kind === "compensation") {
      const failed = this.compensationFailures.findIndex((f) => f.stepId === result.stepId);
      if (failed >= 0) this.compensationFailures.splice(failed, 1);
      this.compensated.push(result.stepId);
      effects.push({ type: "compensated", stepId: result.stepId, succeeded: true, error: null });
      return effects;
    }

    const step = this.byId.get(result.stepId);
    if (!step) return effects;
    switch (this.state.get(step.id)) {
      case "waiting_retry":
        this.retryAt.delete(step.id);
        this.onActionSuccess(step, result, effects);
        break;
      case "in_flight":
        // The retry's own result settles the step; either way it succeeded.
        this.lateSucceeded.add(step.id);
        effects.push({ type: "late_success", stepId: step.id, attempt: result.attempt });
        break;
      case "failed":
      case "abandoned":
        this.state.set(step.id, "succeeded");
        this.completionOrder.push(step.id);
        effects.push({ type: "late_success", stepId: step.id, attempt: result.attempt });
        // Rolling back already: it completed last, so it is undone next.
        if (this.compensationQueue !== null && step.compensatingAction) {
          this.compensationQueue.unshift(step.id);
        }
        break;
      default:
        break;
    }
    return effects;
  }

  private onCompensationResult(result: StepResult, effects: ExecutionEffect[]): void {
    this.compensating = null;
    if (result.outcome === "SUCCESS") {
      this.compensated.push(result.stepId);
      effects.push({ type: "compensated", stepId: result.stepId, succeeded: true, error: null });
    } else {
      const error = result.error ?? `compensation ${result.outcome.toLowerCase()}`;
      this.compensationFailures.push({ stepId: result.stepId, error });
      effects.push({ type: "compensated", stepId: result.stepId, succeeded: false, error });
    }
    this.compensateNext(effects);
  }

  /** Waits for in-flight actions, then rolls back or finishes. */
  private proceedWithHalt(effects: ExecutionEffect[]): void {
    if (this.inFlight().some((f) => f.kind === "action")) return;
    if (this.compensationQueue !== null) return;

    this.compensationQueue = [...this.completionOrder]
      .reverse()
      .filter((id) => this.byId.get(id)?.compensatingAction != null);

    if (this.compensationQueue.length === 0) {
      this.finish(effects);
      return;
    }
    this.setPhase("ROLLING_BACK", effects);
    this.compensateNext(effects);
  }

  private compensateNext(effects: ExecutionEffect[]): void {
    const queue = this.compensationQueue ?? [];
    const next = queue.shift();
    if (next === undefined) {
      this.finish(effects);
      return;
    }
    const action = this.byId.get(next)?.compensatingAction;
    if (!action) {
      this.compensateNext(effects);
      return;
    }
    this.compensating = next;
    effects.push({ type: "dispatch", stepId: next, attempt: 1, kind: "compensation", action });
  }

  private finish(effects: ExecutionEffect[]): void {
    const status: TerminalPhase = this.halt ? this.halt.target : "COMPLETED";
    this.setPhase(status, effects);

    const outcome: TaskOutcome = {
      status,
      completedSteps: [...this.completionOrder],
      compensatedSteps: [...this.compensated],
      finishedAt: this.now().toISOString(),
    };
    const failure: TaskFailure | null = this.halt
      ? {
          code: this.halt.code,
          message: this.halt.message,
          stepId: this.halt.stepId,
          completeness: this.completeness(),
          compensationFailures: [...this.compensationFailures],
        }
      : null;
    effects.push({ type: "finished", status, failure, outcome });
  }

  private completeness(): CompensationCompleteness {
    if (this.completionOrder.length === 0) return "not_required";
    const undone = new Set(this.compensated);
    return this.completionOrder.every((id) => undone.has(id)) ? "complete" : "partial";
  }

  // ── Dispatch ────────────────────────────────────────

  /**
   * Starts every step whose dependencies have succeeded, in plan order.
   * A step runs alongside others only if it and everything busy are
   * parallel-safe, and the parallel limit allows it.
   */
  private dispatchReady(effects: ExecutionEffect[]): void {
    for (const step of this.steps) {
      if (this.state.get(step.id) !== "pending") continue;
      if (!step.dependsOn.every((d) => this.state.get(d) === "succeeded")) continue;

      const busy = this.steps.filter((s) => {
        const st = this.state.get(s.id);
        return st === "in_flight" || st === "waiting_retry";
      });
      if (busy.length > 0) {
        const canJoin =
          step.parallelSafe &&
          busy.every((s) => s.parallelSafe) &&
          busy.length < this.options.maxParallelSteps;
        if (!canJoin) return;
      }
      this.dispatchAction(step, (this.attempts.get(step.id) ?? 0) + 1, effects);
    }
  }

  private dispatchAction(step: Step, attempt: number, effects: ExecutionEffect[]): void {
    this.state.set(step.id, "in_flight");
    this.attempts.set(step.id, attempt);
    effects.push({ type: "dispatch", stepId: step.id, attempt, kind: "action", action: step.action });
  }

  /** Drops pending steps and retries; with no retry left the phase is RUNNING again. */
  private abandonRemaining(effects: ExecutionEffect[]): void {
    for (const [id, s] of this.state) {
      if (s === "pending" || s === "waiting_retry") {
        this.state.set(id, "abandoned");
      }
    }
    this.retryAt.clear();
    if (this.phase === "RETRYING") this.setPhase("RUNNING", effects);
  }

  // ── Phase ───────────────────────────────────────────

  private settlePhase(effects: ExecutionEffect[]): void {
    if (this.halt || this.isTerminal) return;
    this.setPhase(this.retryAt.size > 0 ? "RETRYING" : "RUNNING", effects);
  }

  private setPhase(to: ExecutionPhase, effects: ExecutionEffect[]): void {
    if (this.phase === to) return;
    effects.push({ type: "phase_changed", from: this.phase, to });
    this.phase = to;
  }
}
