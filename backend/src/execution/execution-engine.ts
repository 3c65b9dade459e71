import type {
  AuditDecision,
  Plan,
  StepResult,
  TraceEntry,
} from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import type { MessageBus } from "../bus/message-bus.js";
import { createMessage } from "../bus/envelope.js";
import type { CancelPayload, StepDispatchPayload } from "../bus/payloads.js";
import { TOPICS } from "../bus/topics.js";
import { findStep } from "../domain/plan.js";
import { createStepResult, resultKey } from "../domain/step-result.js";
import { createTraceEntry } from "../domain/trace.js";
import { createLogger, type Logger } from "../logger.js";
import type { KeyedQueue } from "../orchestrator/task-queue.js";
import type { AuditLog } from "../security/audit-log.js";
import type { IStateStore } from "../store/interface.js";
import {
  PlanExecution,
  type ExecutionEffect,
  type ExecutionPhase,
} from "./plan-execution.js";

// ─── Types ──────────────────────────────────────────────

export interface EngineConfig {
  maxParallelSteps: number;
  backoffCapMs: number;
  /** Budget handed to the executor for one attempt. */
  stepTimeoutMs: number;
  /** How long to wait for any result before synthesizing a TIMEOUT. */
  resultTimeoutMs: number;
}

export type FinishedEffect = Extract<ExecutionEffect, { type: "finished" }>;

export interface EngineHooks {
  phaseChanged(taskId: string, to: ExecutionPhase): Promise<void>;
  finished(plan: Plan, finished: FinishedEffect, results: readonly StepResult[]): Promise<void>;
}

export interface EngineDeps {
  bus: MessageBus;
  store: IStateStore;
  audit: AuditLog;
  queue: KeyedQueue;
  hooks: EngineHooks;
}

interface Tracked {
  plan: Plan;
  fsm: PlanExecution;
  /** Gate decision that let this plan run; stamped on every dispatch audit entry. */
  authorization: AuditDecision;
  results: StepResult[];
  priority: number;
}

interface Timer {
  taskId: string;
  handle: ReturnType<typeof setTimeout>;
}

// ─── Execution Engine ───────────────────────────────────

/**
 * Drives one {@link PlanExecution} per task and performs its effects.
 * Every public method must run inside the task's slot of the shared
 * queue; timers re-enter through that queue.
 */
export class ExecutionEngine {
  private readonly log: Logger = createLogger("execution-engine");
  private readonly executions = new Map<string, Tracked>();
  private readonly timers = new Map<string, Timer>();

  constructor(
    private readonly config: EngineConfig,
    private readonly deps: EngineDeps,
  ) {}

  has(taskId: string): boolean {
    return this.executions.has(taskId);
  }

  lastResult(taskId: string): StepResult | null {
    return this.executions.get(taskId)?.fsm.lastResult ?? null;
  }

  phaseOf(taskId: string): ExecutionPhase | null {
    return this.executions.get(taskId)?.fsm.currentPhase ?? null;
  }

  async start(plan: Plan, authorization: AuditDecision, priority = 3): Promise<void> {
    if (this.executions.has(plan.taskId)) return;
    const tracked = this.track(plan, authorization, priority);
    await this.carryOut(tracked, tracked.fsm.start());
  }

  /**
   * Rebuilds an execution from stored results and puts outstanding work
   * back in motion. A non-null `cancelReason` replays a cancellation that
   * was requested before the restart.
   */
  async restore(
    plan: Plan,
    authorization: AuditDecision,
    results: readonly StepResult[],
    cancelReason: string | null,
    priority = 3,
  ): Promise<void> {
    if (this.executions.has(plan.taskId)) return;
    const tracked = this.track(plan, authorization, priority);
    const { fsm } = tracked;

    const replay: ExecutionEffect[] = [...fsm.start()];
    for (const result of results) {
      const applied = fsm.applyResult(result);
      if (applied.isErr()) continue;
      if (!applied.value.some((e) => e.type === "ignored")) tracked.results.push(result);
      replay.push(...applied.value);
    }

    const finished = replay.find((e): e is FinishedEffect => e.type === "finished");
    if (finished) {
      await this.carryOut(tracked, [finished]);
      return;
    }

    await this.deps.hooks.phaseChanged(plan.taskId, fsm.currentPhase);
    const effects = fsm.resume();
    if (cancelReason !== null) effects.push(...fsm.cancel(cancelReason));
    this.log.info(
      { taskId: plan.taskId, replayed: results.length, phase: fsm.currentPhase },
      "execution restored",
    );
    await this.carryOut(tracked, effects);
  }

  /** Applies one result; duplicates are logged and dropped. */
  async apply(result: StepResult): Promise<void> {
    const tracked = this.executions.get(result.taskId);
    if (!tracked) {
      if (result.kind === "action" && result.outcome === "SUCCESS") {
        this.log.warn(
          { taskId: result.taskId, stepId: result.stepId, attempt: result.attempt },
          "step succeeded after its task finished; effect was not compensated",
        );
      } else {
        this.log.debug({ taskId: result.taskId, stepId: result.stepId }, "result for inactive task");
      }
      return;
    }
    const key = resultKey(result.taskId, result.stepId, result.kind, result.attempt);
    const applied = tracked.fsm.applyResult(result);
    if (applied.isErr()) {
      this.log.debug({ key }, "duplicate result ignored");
      return;
    }

    const effects = applied.value;
    if (!effects.some((e) => e.type === "ignored")) {
      this.clearTimer(`watch:${key}`);
      tracked.results.push(result);
      const stored = await this.deps.store.appendStepResult(result);
      if (stored.isErr()) throw stored.error;
    }
    await this.carryOut(tracked, effects);
  }

  /** Returns false when the task has no running execution. */
  async cancel(taskId: string, reason: string): Promise<boolean> {
    const tracked = this.executions.get(taskId);
    if (!tracked) return false;
    await this.carryOut(tracked, tracked.fsm.cancel(reason));
    return true;
  }

  stop(): void {
    for (const timer of this.timers.values()) clearTimeout(timer.handle);
    this.timers.clear();
    this.executions.clear();
  }

  // ── Effects ─────────────────────────────────────────

  private track(plan: Plan, authorization: AuditDecision, priority: number): Tracked {
    const tracked: Tracked = {
      plan,
      authorization,
      priority,
      results: [],
      fsm: new PlanExecution(plan, {
        maxParallelSteps: this.config.maxParallelSteps,
        backoffCapMs: this.config.backoffCapMs,
      }),
    };
    this.executions.set(plan.taskId, tracked);
    return tracked;
  }

  private async carryOut(tracked: Tracked, effects: readonly ExecutionEffect[]): Promise<void> {
    const { taskId } = tracked.plan;
    for (const effect of effects) {
      switch (effect.type) {
        case "dispatch":
          await this.dispatch(tracked, effect);
          break;
        case "schedule_retry":
          this.scheduleRetry(taskId, effect.stepId, effect.attempt, effect.delayMs);
          await this.trace(
            createTraceEntry(taskId, AGENT_IDS.orchestrator, "RETRY", `Retrying in ${effect.delayMs}ms`, {
              stepId: effect.stepId,
              attempt: effect.attempt,
            }),
          );
          break;
        case "abort":
          this.publish(TOPICS.executionControl, tracked, "CANCEL", {
            taskId,
            reason: `abort ${effect.stepIds.length} in-flight step(s)`,
          } satisfies CancelPayload);
          break;
        case "phase_changed":
          if (effect.to === "RUNNING" || effect.to === "RETRYING" || effect.to === "ROLLING_BACK") {
            await this.deps.hooks.phaseChanged(taskId, effect.to);
          }
          if (effect.to === "ROLLING_BACK") {
            await this.trace(
              createTraceEntry(taskId, AGENT_IDS.orchestrator, "ROLLBACK", "Compensating succeeded steps in reverse order", {
                planId: tracked.plan.id,
              }),
            );
          }
          break;
        case "step_succeeded":
          await this.trace(
            createTraceEntry(taskId, AGENT_IDS.execution, "STEP_SUCCEEDED", this.label(tracked, effect.stepId), {
              stepId: effect.stepId,
              attempt: effect.attempt,
            }),
          );
          break;
        case "late_success":
          await this.trace(
            createTraceEntry(
              taskId,
              AGENT_IDS.execution,
              "STEP_SUCCEEDED",
              `${this.label(tracked, effect.stepId)} (result arrived after its timeout)`,
              { stepId: effect.stepId, attempt: effect.attempt },
            ),
          );
          break;
        case "step_failed":
          await this.trace(
            createTraceEntry(
              taskId,
              AGENT_IDS.execution,
              "STEP_FAILED",
              `${this.label(tracked, effect.stepId)}: ${effect.error}${effect.willRetry ? "" : " (giving up)"}`,
              { stepId: effect.stepId, attempt: effect.attempt },
            ),
          );
          break;
        case "compensated":
          await this.trace(
            createTraceEntry(
              taskId,
              AGENT_IDS.execution,
              "COMPENSATED",
              effect.succeeded
                ? `Undid ${this.label(tracked, effect.stepId)}`
                : `Compensation failed for ${this.label(tracked, effect.stepId)}: ${effect.error ?? "unknown"}`,
              { stepId: effect.stepId },
            ),
          );
          break;
        case "ignored":
          this.log.debug({ key: effect.key, reason: effect.reason }, "result ignored");
          break;
        case "finished":
          this.executions.delete(taskId);
          this.clearTask(taskId);
          await this.deps.hooks.finished(tracked.plan, effect, tracked.results);
          break;
      }
    }
  }

  /** Audits, publishes and arms the result watchdog, in that order. */
  private async dispatch(
    tracked: Tracked,
    effect: Extract<ExecutionEffect, { type: "dispatch" }>,
  ): Promise<void> {
    const { taskId } = tracked.plan;
    const step = findStep(tracked.plan, effect.stepId);
    const audited = await this.deps.audit.append({
      taskId,
      stepId: effect.stepId,
      actor: AGENT_IDS.execution,
      action: effect.kind === "action" ? `step:dispatch:${effect.action.name}` : `step:compensate:${effect.action.name}`,
      riskScore: step?.riskScore ?? 0,
      decision: tracked.authorization,
    });
    if (audited.isErr()) throw audited.error;

    const payload: StepDispatchPayload = {
      taskId,
      stepId: effect.stepId,
      attempt: effect.attempt,
      kind: effect.kind,
      action: effect.action,
      timeoutMs: this.config.stepTimeoutMs,
    };
    this.publish(TOPICS.executionSteps, tracked, "STEP_DISPATCH", payload);
    this.watch(tracked, payload);

    await this.trace(
      createTraceEntry(
        taskId,
        AGENT_IDS.orchestrator,
        "DISPATCHED",
        `${effect.kind === "action" ? "Dispatched" : "Compensating"} ${effect.action.label}`,
        { planId: tracked.plan.id, stepId: effect.stepId, attempt: effect.attempt },
      ),
    );
  }

  private publish(
    topic: string,
    tracked: Tracked,
    messageType: "STEP_DISPATCH" | "CANCEL",
    payload: StepDispatchPayload | CancelPayload,
  ): void {
    const published = this.deps.bus.publish(
      topic,
      createMessage({
        senderId: AGENT_IDS.orchestrator,
        receiverId: AGENT_IDS.execution,
        messageType,
        payload,
        correlationId: tracked.plan.taskId,
        priority: tracked.priority,
      }),
    );
    if (published.isErr()) throw published.error;
  }

  // ── Timers ──────────────────────────────────────────

  private scheduleRetry(taskId: string, stepId: string, attempt: number, delayMs: number): void {
    this.setTimer(`retry:${taskId}:${stepId}`, taskId, delayMs, async () => {
      const tracked = this.executions.get(taskId);
      if (!tracked) return;
      await this.carryOut(tracked, tracked.fsm.retryDue(stepId, attempt));
    });
  }

  private watch(tracked: Tracked, dispatch: StepDispatchPayload): void {
    const key = resultKey(dispatch.taskId, dispatch.stepId, dispatch.kind, dispatch.attempt);
    this.setTimer(`watch:${key}`, dispatch.taskId, this.config.resultTimeoutMs, async () => {
      this.log.warn({ key }, "no step result in time, synthesizing timeout");
      await this.apply(
        createStepResult({
          taskId: dispatch.taskId,
          stepId: dispatch.stepId,
          attempt: dispatch.attempt,
          kind: dispatch.kind,
          action: dispatch.action,
          outcome: "TIMEOUT",
          error: `No result within ${this.config.resultTimeoutMs}ms`,
          retryable: true,
          durationMs: this.config.resultTimeoutMs,
        }),
      );
    });
  }

  private setTimer(name: string, taskId: string, delayMs: number, fire: () => Promise<void>): void {
    this.clearTimer(name);
    const handle = setTimeout(() => {
      this.timers.delete(name);
      this.deps.queue
        .run(taskId, fire)
        .catch((e) => this.log.error({ err: e, taskId, timer: name }, "timer handler failed"));
    }, delayMs);
    this.timers.set(name, { taskId, handle });
  }

  private clearTimer(name: string): void {
    const timer = this.timers.get(name);
    if (!timer) return;
    clearTimeout(timer.handle);
    this.timers.delete(name);
  }

  private clearTask(taskId: string): void {
    for (const [name, timer] of this.timers) {
      if (timer.taskId === taskId) {
        clearTimeout(timer.handle);
        this.timers.delete(name);
      }
    }
  }

  // ── Helpers ─────────────────────────────────────────

  private label(tracked: Tracked, stepId: string): string {
    return findStep(tracked.plan, stepId)?.action.label ?? stepId;
  }

  private async trace(entry: TraceEntry): Promise<void> {
    const written = await this.deps.store.appendTrace(entry);
    if (written.isErr()) {
      this.log.warn({ err: written.error, taskId: entry.taskId }, "trace write failed");
    }
  }
}
