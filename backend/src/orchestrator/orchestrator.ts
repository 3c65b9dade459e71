import { ok, err, Result } from "neverthrow";
import type {
  AgentMessage,
  AuditDecision,
  AuditEntry,
  CreateTaskInput,
  ErrorCode,
  FeedbackRecord,
  Plan,
  StepDraft,
  Task,
  TaskFailure,
  TaskOutcome,
  TaskStatus,
  TaskView,
  TraceEntry,
} from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import { BusAgent } from "../agents/bus-agent.js";
import type { HealthRegistry } from "../agents/agent-health.js";
import type { MessageBus } from "../bus/message-bus.js";
import { createMessage, readPayload } from "../bus/envelope.js";
import {
  CancelPayloadSchema,
  PlanProposedPayloadSchema,
  SecurityDecisionPayloadSchema,
  StepResultPayloadSchema,
  TaskRequestPayloadSchema,
  type PlanProposedPayload,
  type PlanRequestPayload,
  type SecurityDecisionPayload,
  type TaskRequestPayload,
} from "../bus/payloads.js";
import { TOPICS } from "../bus/topics.js";
import { AuditIntegrityError, ConfirmationTimeoutError, RollbackFailure } from "../domain/errors.js";
import { changePlanStatus } from "../domain/plan.js";
import {
  attachPlan,
  createTask,
  isTerminal,
  transitionTask,
} from "../domain/task.js";
import { createTraceEntry } from "../domain/trace.js";
import {
  ExecutionEngine,
  type EngineConfig,
  type FinishedEffect,
} from "../execution/execution-engine.js";
import type { ExecutionPhase } from "../execution/plan-execution.js";
import type { LeaseHandle, TaskLeaseManager } from "../lease/task-lease.js";
import type { MemoryProvider } from "../memory/provider.js";
import type { AuditLog } from "../security/audit-log.js";
import { ConfirmationError } from "../security/confirmation.js";
import type { SecurityGate } from "../security/security-gate.js";
import type { IStateStore, TaskFilter } from "../store/interface.js";
import { KeyedQueue } from "./task-queue.js";
import { buildTaskView, summarizeTask, type TaskSummary } from "./task-view.js";

// ─── Types ──────────────────────────────────────────────

export interface OrchestratorConfig {
  maxReplans: number;
  leaseRenewIntervalMs: number;
  execution: EngineConfig;
}

export interface OrchestratorDeps {
  store: IStateStore;
  bus: MessageBus;
  health: HealthRegistry;
  leases: TaskLeaseManager;
  gate: SecurityGate;
  audit: AuditLog;
  /** Receives the execution record of every finished task. */
  memory: MemoryProvider | null;
}

export type OrchestratorErrorCode = "NOT_FOUND" | "CONFLICT" | "UNAVAILABLE";

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly code: OrchestratorErrorCode,
  ) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export interface AuditReport {
  entries: AuditEntry[];
  verified: boolean;
  error: string | null;
}

const ACTIVE_STATUSES: TaskStatus[] = [
  "PENDING",
  "PLANNING",
  "AWAITING_CONFIRMATION",
  "RUNNING",
  "RETRYING",
  "ROLLING_BACK",
];

// ─── Orchestrator ───────────────────────────────────────

/**
 * Owns task records. Every mutation of a task happens inside that task's
 * slot of a keyed queue, under a lease on the task.
 */
export class Orchestrator extends BusAgent {
  private readonly queue = new KeyedQueue();
  private readonly engine: ExecutionEngine;
  private readonly leases = new Map<string, LeaseHandle>();
  private readonly drafts = new Map<string, StepDraft[]>();
  private readonly confirmationTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private renewTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly config: OrchestratorConfig,
    private readonly deps: OrchestratorDeps,
  ) {
    super(AGENT_IDS.orchestrator, deps.bus, deps.health);
    this.engine = new ExecutionEngine(config.execution, {
      bus: deps.bus,
      store: deps.store,
      audit: deps.audit,
      queue: this.queue,
      hooks: {
        phaseChanged: (taskId, to) => this.onPhaseChanged(taskId, to),
        finished: (plan, finished) => this.onExecutionFinished(plan, finished),
      },
    });
  }

  // ─── Lifecycle ──────────────────────────────────────

  protected subscribeAll(): void {
    this.consume(TOPICS.orchestratorInbox, (m) => this.onInbox(m));
    this.consume(TOPICS.stepResults, (m) => this.onStepResult(m));
    this.renewTimer = setInterval(() => {
      this.renewLeases().catch((e) => this.log.error({ err: e }, "lease renewal failed"));
    }, this.config.leaseRenewIntervalMs);
  }

  override stop(): void {
    super.stop();
    if (this.renewTimer) clearInterval(this.renewTimer);
    this.renewTimer = null;
    for (const timer of this.confirmationTimers.values()) clearTimeout(timer);
    this.confirmationTimers.clear();
    this.engine.stop();
  }

  /** Stops and gives up every lease this process holds. */
  async shutdown(): Promise<void> {
    this.stop();
    await this.queue.idle();
    const held = [...this.leases.values()];
    this.leases.clear();
    await Promise.all(held.map((lease) => lease.release()));
  }

  /** Settles once no task work is queued. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /**
   * Picks up non-terminal tasks left by a previous process, for every task
   * whose lease can be taken. Runs before subscriptions start.
   */
  async recover(): Promise<void> {
    const listed = await this.deps.store.listTasks({ status: ACTIVE_STATUSES });
    if (listed.isErr()) throw listed.error;
    for (const task of listed.value) {
      await this.queue
        .run(task.id, () => this.recoverTask(task))
        .catch((e) => this.log.error({ err: e, taskId: task.id }, "recovery failed"));
    }
  }

  // ─── Caller Operations ──────────────────────────────

  async submit(input: CreateTaskInput): Promise<Result<Task, Error>> {
    const task = createTask({
      intent: input.intent,
      roleScope: input.roleScope,
      priority: input.priority,
      tags: input.tags,
    });
    const created = await this.deps.store.createTask(task);
    if (created.isErr()) return err(created.error);

    await this.trace(createTraceEntry(task.id, AGENT_IDS.api, "RECEIVED", `Intent received: ${task.intent}`));

    const published = this.bus.publish(
      TOPICS.orchestratorInbox,
      createMessage({
        senderId: AGENT_IDS.api,
        receiverId: AGENT_IDS.orchestrator,
        messageType: "TASK_REQUEST",
        payload: { taskId: task.id, drafts: input.steps ?? null } satisfies TaskRequestPayload,
        correlationId: task.correlationId,
        priority: task.priority,
      }),
    );
    if (published.isErr()) return err(published.error);
    return ok(created.value);
  }

  confirm(taskId: string, token: string): Promise<Result<Task, OrchestratorError>> {
    return this.queue.run<Result<Task, OrchestratorError>>(taskId, async () => {
      const loaded = await this.findTask(taskId);
      if (loaded.isErr()) return err(loaded.error);
      const task = loaded.value;
      if (task.status !== "AWAITING_CONFIRMATION") {
        return err(new OrchestratorError(`Task ${taskId} is ${task.status}, not awaiting confirmation`, "CONFLICT"));
      }
      if (!(await this.ensureLease(taskId))) {
        return err(new OrchestratorError(`Task ${taskId} is owned by another orchestrator`, "CONFLICT"));
      }

      const confirmed = await this.deps.gate.confirm(taskId, token);
      if (confirmed.isErr()) {
        const error = confirmed.error;
        if (error instanceof ConfirmationError) {
          return err(new OrchestratorError(error.message, "CONFLICT"));
        }
        throw error;
      }
      this.clearConfirmationTimer(taskId);
      await this.trace(
        createTraceEntry(taskId, AGENT_IDS.security, "CONFIRMED", "Plan confirmed by user", {
          planId: confirmed.value.planId,
        }),
      );

      const plan = await this.loadPlan(taskId, confirmed.value.planId);
      await this.runPlan(task, plan, "CONFIRMED");
      return ok(await this.loadTask(taskId));
    });
  }

  cancel(taskId: string, reason = "cancelled by caller"): Promise<Result<Task, OrchestratorError>> {
    return this.queue.run<Result<Task, OrchestratorError>>(taskId, async () => {
      const loaded = await this.findTask(taskId);
      if (loaded.isErr()) return err(loaded.error);
      const task = loaded.value;
      if (isTerminal(task.status)) {
        return err(new OrchestratorError(`Task ${taskId} is already ${task.status}`, "CONFLICT"));
      }
      if (!(await this.ensureLease(taskId))) {
        return err(new OrchestratorError(`Task ${taskId} is owned by another orchestrator`, "CONFLICT"));
      }
      await this.applyCancel(task, reason);
      return ok(await this.loadTask(taskId));
    });
  }

  async feedback(
    taskId: string,
    input: { humanRating: number; correctionNotes: string },
  ): Promise<Result<FeedbackRecord, OrchestratorError>> {
    const loaded = await this.findTask(taskId);
    if (loaded.isErr()) return err(loaded.error);

    const record: FeedbackRecord = {
      taskId,
      humanRating: input.humanRating,
      correctionNotes: input.correctionNotes,
      timestamp: new Date().toISOString(),
    };
    const stored = await this.deps.store.appendFeedback(record);
    if (stored.isErr()) throw stored.error;

    const published = this.bus.publish(
      TOPICS.feedback,
      createMessage({
        senderId: AGENT_IDS.api,
        receiverId: AGENT_IDS.learning,
        messageType: "FEEDBACK",
        payload: record,
        correlationId: taskId,
        priority: loaded.value.priority,
      }),
    );
    if (published.isErr()) {
      return err(new OrchestratorError(published.error.message, "UNAVAILABLE"));
    }
    return ok(record);
  }

  async view(taskId: string): Promise<Result<TaskView, OrchestratorError>> {
    const loaded = await this.findTask(taskId);
    if (loaded.isErr()) return err(loaded.error);
    const task = loaded.value;

    let plan: Plan | null = null;
    if (task.planId) {
      const stored = await this.deps.store.getPlan(taskId, task.planId);
      if (stored.isOk()) plan = stored.value;
    }

    let last = this.engine.lastResult(taskId);
    if (!last) {
      const results = await this.deps.store.getStepResults(taskId);
      if (results.isErr()) throw results.error;
      last = results.value.at(-1) ?? null;
    }
    return ok(buildTaskView(task, plan, last, this.deps.gate.pendingConfirmation(taskId)));
  }

  async list(filter: TaskFilter): Promise<TaskSummary[]> {
    const listed = await this.deps.store.listTasks(filter);
    if (listed.isErr()) throw listed.error;
    return listed.value.map(summarizeTask);
  }

  async auditReport(taskId: string): Promise<Result<AuditReport, OrchestratorError>> {
    const loaded = await this.findTask(taskId);
    if (loaded.isErr()) return err(loaded.error);
    const entries = await this.deps.store.getAudit(taskId);
    if (entries.isErr()) throw entries.error;
    const verified = await this.deps.gate.verify(taskId);
    return ok({
      entries: entries.value,
      verified: verified.isOk(),
      error: verified.isErr() ? verified.error.message : null,
    });
  }

  async traceOf(taskId: string): Promise<Result<TraceEntry[], OrchestratorError>> {
    const loaded = await this.findTask(taskId);
    if (loaded.isErr()) return err(loaded.error);
    const traces = await this.deps.store.getTraces(taskId);
    if (traces.isErr()) throw traces.error;
    return ok(traces.value);
  }

  // ─── Inbox ──────────────────────────────────────────

  private async onInbox(message: AgentMessage): Promise<void> {
    switch (message.messageType) {
      case "TASK_REQUEST": {
        const payload = readPayload(message, "TASK_REQUEST", TaskRequestPayloadSchema);
        if (payload.isErr()) break;
        const { taskId, drafts } = payload.value;
        await this.queue.run(taskId, () => this.onTaskRequest(taskId, drafts));
        return;
      }
      case "PLAN_PROPOSED": {
        const payload = readPayload(message, "PLAN_PROPOSED", PlanProposedPayloadSchema);
        if (payload.isErr()) break;
        const proposal = payload.value;
        await this.queue.run(proposal.taskId, () => this.onPlanProposed(proposal));
        return;
      }
      case "SECURITY_DECISION": {
        const payload = readPayload(message, "SECURITY_DECISION", SecurityDecisionPayloadSchema);
        if (payload.isErr()) break;
        const decision = payload.value;
        await this.queue.run(decision.plan.taskId, () => this.onSecurityDecision(decision));
        return;
      }
      case "CANCEL": {
        const payload = readPayload(message, "CANCEL", CancelPayloadSchema);
        if (payload.isErr()) break;
        const cancelled = await this.cancel(payload.value.taskId, payload.value.reason);
        if (cancelled.isErr()) {
          this.log.info({ taskId: payload.value.taskId, reason: cancelled.error.message }, "cancel not applied");
        }
        return;
      }
      default:
        break;
    }
    this.log.warn({ messageType: message.messageType, id: message.id }, "dropping inbox message");
  }

  private async onStepResult(message: AgentMessage): Promise<void> {
    const payload = readPayload(message, "STEP_RESULT", StepResultPayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping step result");
      return;
    }
    const result = payload.value;
    await this.queue.run(result.taskId, async () => {
      if (!this.leases.has(result.taskId)) return;
      await this.engine.apply(result);
    });
  }

  private async onTaskRequest(
    taskId: string,
    drafts: StepDraft[] | null,
  ): Promise<void> {
    const task = await this.loadTask(taskId);
    if (task.status !== "PENDING") return;
    if (!(await this.ensureLease(taskId))) return;

    if (drafts) this.drafts.set(taskId, drafts);
    const planning = await this.moveTo(task, "PLANNING");
    this.requestPlan(planning, null);
  }

  private async onPlanProposed(proposal: PlanProposedPayload): Promise<void> {
    const task = await this.loadTask(proposal.taskId);
    if (task.status !== "PLANNING" || !this.leases.has(task.id)) return;

    if (!proposal.plan) {
      const error = proposal.error ?? { code: "PlanValidationError", message: "planner returned no plan", stepId: null };
      await this.trace(createTraceEntry(task.id, AGENT_IDS.planning, "PLAN_REJECTED", error.message));
      await this.finish(task, "FAILED", this.failure(toErrorCode(error.code), error.message, error.stepId));
      return;
    }

    const plan = proposal.plan;
    if (plan.version <= task.planVersion) return;

    await this.savePlan(plan);
    if (plan.supersedes) {
      const previous = await this.deps.store.getPlan(task.id, plan.supersedes);
      if (previous.isOk()) {
        const superseded = changePlanStatus(previous.value, "SUPERSEDED");
        if (superseded.isOk()) await this.savePlan(superseded.value);
      }
    }
    const updated = await this.save(attachPlan(task, plan.id, plan.version));
    await this.trace(
      createTraceEntry(
        task.id,
        AGENT_IDS.planning,
        "PLANNED",
        `Plan v${plan.version} with ${plan.steps.length} step(s)${plan.contextDegraded ? " (degraded context)" : ""}`,
        { planId: plan.id },
      ),
    );

    this.publish(TOPICS.securityRequests, updated, AGENT_IDS.security, "PLAN_PROPOSED", { plan });
  }

  private async onSecurityDecision({ decision, plan }: SecurityDecisionPayload): Promise<void> {
    const task = await this.loadTask(plan.taskId);
    if (task.status !== "PLANNING" || task.planId !== plan.id || !this.leases.has(task.id)) return;

    await this.savePlan(plan);
    await this.trace(
      createTraceEntry(
        task.id,
        AGENT_IDS.security,
        "GATED",
        `${decision.decision} at risk ${decision.aggregateRiskScore.toFixed(3)}${decision.reason ? `: ${decision.reason}` : ""}`,
        { planId: plan.id },
      ),
    );

    switch (decision.decision) {
      case "REJECTED": {
        await this.rejectPlan(plan);
        const riskiest = [...decision.stepRisks].sort((a, b) => b.score - a.score)[0];
        await this.finish(
          task,
          "FAILED",
          this.failure("RiskExceeded", decision.reason ?? "plan risk exceeds threshold", riskiest?.stepId ?? null),
        );
        return;
      }
      case "AUTO_APPROVED":
        await this.runPlan(task, plan, "AUTO_APPROVED");
        return;
      case "CONFIRMATION_REQUIRED": {
        await this.moveTo(task, "AWAITING_CONFIRMATION");
        const expiresAt = decision.confirmation ? Date.parse(decision.confirmation.expiresAt) : Date.now();
        this.armConfirmationTimer(task.id, Math.max(0, expiresAt - Date.now()));
        return;
      }
    }
  }

  // ─── Execution ──────────────────────────────────────

  /** Verifies the audit chain, accepts the plan and starts it. */
  private async runPlan(task: Task, plan: Plan, authorization: AuditDecision): Promise<void> {
    const verified = await this.deps.gate.verify(task.id);
    if (verified.isErr()) {
      if (verified.error instanceof AuditIntegrityError) {
        await this.rejectPlan(plan);
        await this.finish(task, "FAILED", this.failure("AuditIntegrityError", verified.error.message, null));
        return;
      }
      throw verified.error;
    }

    const accepted = changePlanStatus(plan, "ACCEPTED");
    if (accepted.isErr()) throw accepted.error;
    await this.savePlan(accepted.value);
    await this.engine.start(accepted.value, authorization, task.priority);
  }

  private async onPhaseChanged(taskId: string, to: ExecutionPhase): Promise<void> {
    if (to !== "RUNNING" && to !== "RETRYING" && to !== "ROLLING_BACK") return;
    const task = await this.loadTask(taskId);
    if (task.status === to) return;
    const moved = transitionTask(task, to);
    if (moved.isErr()) {
      this.log.warn({ taskId, from: task.status, to }, "execution phase does not map to a task transition");
      return;
    }
    await this.save(moved.value);
  }

  private async onExecutionFinished(plan: Plan, finished: FinishedEffect): Promise<void> {
    const task = await this.loadTask(plan.taskId);
    if (
      finished.status === "FAILED" &&
      finished.failure?.code === "StepExecutionError" &&
      task.replanCount < this.config.maxReplans
    ) {
      const planning = await this.moveTo(task, "PLANNING", { replanCount: task.replanCount + 1 });
      await this.trace(
        createTraceEntry(
          task.id,
          AGENT_IDS.orchestrator,
          "REPLANNED",
          `Re-planning (${planning.replanCount}/${this.config.maxReplans}) after: ${finished.failure.message}`,
          { planId: plan.id },
        ),
      );
      this.requestPlan(planning, plan);
      return;
    }
    const compensationFailures = finished.failure?.compensationFailures ?? [];
    if (compensationFailures.length > 0) {
      const rollback = new RollbackFailure(compensationFailures);
      this.log.warn({ taskId: task.id, code: rollback.code, failures: rollback.failures }, rollback.message);
      await this.trace(createTraceEntry(task.id, AGENT_IDS.orchestrator, "ROLLBACK_INCOMPLETE", rollback.message, { planId: plan.id }));
    }
    await this.finish(task, finished.status, finished.failure, finished.outcome, plan);
  }

  private async applyCancel(task: Task, reason: string): Promise<void> {
    const failure = this.failure("Cancelled", reason, null);
    const marked = await this.save({ ...task, failure: { ...failure, completeness: null } });
    if (await this.engine.cancel(task.id, reason)) return;

    if (marked.status === "AWAITING_CONFIRMATION") {
      this.clearConfirmationTimer(task.id);
      const withdrawn = await this.deps.gate.withdraw(task.id);
      if (withdrawn.isErr()) throw withdrawn.error;
    }
    if (marked.planId) {
      const plan = await this.deps.store.getPlan(task.id, marked.planId);
      if (plan.isOk() && plan.value.status === "PROPOSED") await this.rejectPlan(plan.value);
    }
    await this.finish(marked, "CANCELLED", failure);
  }

  private async onConfirmationTimeout(taskId: string): Promise<void> {
    this.confirmationTimers.delete(taskId);
    const task = await this.loadTask(taskId);
    if (task.status !== "AWAITING_CONFIRMATION") return;
    const expired = await this.deps.gate.expire(taskId);
    if (expired.isErr()) throw expired.error;
    if (!expired.value) return;
    await this.failConfirmation(task);
  }

  private async failConfirmation(task: Task): Promise<void> {
    if (task.planId) {
      const plan = await this.deps.store.getPlan(task.id, task.planId);
      if (plan.isOk() && plan.value.status === "PROPOSED") await this.rejectPlan(plan.value);
    }
    const error = new ConfirmationTimeoutError(task.id);
    await this.finish(task, "FAILED", this.failure(error.code, error.message, null));
  }

  // ─── Recovery ───────────────────────────────────────

  private async recoverTask(listed: Task): Promise<void> {
    if (!(await this.ensureLease(listed.id))) {
      this.log.info({ taskId: listed.id }, "task leased elsewhere, not recovering");
      return;
    }
    const task = await this.loadTask(listed.id);
    await this.trace(
      createTraceEntry(task.id, "system", "RECOVERED", `Recovering task in ${task.status}`),
    );
    this.log.info({ taskId: task.id, status: task.status }, "recovering task");

    switch (task.status) {
      case "PENDING": {
        const planning = await this.moveTo(task, "PLANNING");
        this.requestPlan(planning, null);
        return;
      }
      case "PLANNING": {
        const current = task.planId ? await this.deps.store.getPlan(task.id, task.planId) : null;
        if (current?.isOk() && current.value.status === "PROPOSED") {
          this.publish(TOPICS.securityRequests, task, AGENT_IDS.security, "PLAN_PROPOSED", { plan: current.value });
          return;
        }
        const supersedes = current?.isOk() && current.value.status === "ACCEPTED" ? current.value : null;
        this.requestPlan(task, supersedes);
        return;
      }
      case "AWAITING_CONFIRMATION": {
        const expired = await this.deps.gate.expire(task.id, true);
        if (expired.isErr()) throw expired.error;
        await this.failConfirmation(task);
        return;
      }
      case "RUNNING":
      case "RETRYING":
      case "ROLLING_BACK": {
        if (!task.planId) throw new Error(`Task ${task.id} is ${task.status} without a plan`);
        const plan = await this.loadPlan(task.id, task.planId);
        const verified = await this.deps.gate.verify(task.id);
        if (verified.isErr()) {
          if (verified.error instanceof AuditIntegrityError) {
            await this.finish(task, "FAILED", this.failure("AuditIntegrityError", verified.error.message, null), undefined, plan);
            return;
          }
          throw verified.error;
        }
        const confirmedByUser = verified.value.some((e) => e.action === "plan:confirm");
        const results = await this.deps.store.getStepResults(task.id);
        if (results.isErr()) throw results.error;
        const cancelReason = task.failure?.code === "Cancelled" ? task.failure.message : null;
        await this.engine.restore(
          plan,
          confirmedByUser ? "CONFIRMED" : "AUTO_APPROVED",
          results.value,
          cancelReason,
          task.priority,
        );
        return;
      }
      default:
        return;
    }
  }

  // ─── Terminal ───────────────────────────────────────

  private async finish(
    task: Task,
    status: TaskOutcome["status"],
    failure: TaskFailure | null,
    outcome?: TaskOutcome,
    plan?: Plan,
  ): Promise<void> {
    const final = await this.moveTo(task, status, {
      failure,
      outcome: outcome ?? {
        status,
        completedSteps: [],
        compensatedSteps: [],
        finishedAt: new Date().toISOString(),
      },
    });
    await this.trace(
      createTraceEntry(
        task.id,
        AGENT_IDS.orchestrator,
        status,
        failure ? `${failure.code}: ${failure.message}` : "All steps completed",
        { planId: task.planId ?? undefined },
      ),
    );
    this.log.info({ taskId: task.id, status, code: failure?.code }, "task finished");

    await this.recordExecution(final, plan ?? null);
    this.clearConfirmationTimer(task.id);
    this.drafts.delete(task.id);
    const lease = this.leases.get(task.id);
    this.leases.delete(task.id);
    await lease?.release();
  }

  private async recordExecution(task: Task, plan: Plan | null): Promise<void> {
    if (!this.deps.memory) return;
    const results = await this.deps.store.getStepResults(task.id);
    if (results.isErr()) throw results.error;
    const recorded = await this.deps.memory.recordExecution({ task, plan, results: results.value });
    if (recorded.isErr()) {
      this.log.warn({ taskId: task.id, err: recorded.error }, "execution not recorded in memory");
    }
  }

  // ─── Helpers ────────────────────────────────────────

  private failure(code: ErrorCode, message: string, stepId: string | null): TaskFailure {
    return { code, message, stepId, completeness: "not_required", compensationFailures: [] };
  }

  private requestPlan(task: Task, supersedes: Plan | null): void {
    const payload: PlanRequestPayload = {
      taskId: task.id,
      intent: task.intent,
      roleScope: task.roleScope,
      planVersion: task.planVersion,
      drafts: this.drafts.get(task.id) ?? null,
      supersedes,
    };
    this.publish(TOPICS.planningRequests, task, AGENT_IDS.planning, "TASK_REQUEST", payload);
  }

  private publish(
    topic: string,
    task: Task,
    receiverId: string,
    messageType: "TASK_REQUEST" | "PLAN_PROPOSED",
    payload: PlanRequestPayload | { plan: Plan },
  ): void {
    this.send(
      topic,
      createMessage({
        senderId: this.agentId,
        receiverId,
        messageType,
        payload,
        correlationId: task.correlationId,
        priority: task.priority,
      }),
    );
  }

  private async ensureLease(taskId: string): Promise<boolean> {
    if (this.leases.has(taskId)) return true;
    const acquired = await this.deps.leases.acquire(taskId);
    if (acquired.isErr()) {
      if (acquired.error.code === "HELD") return false;
      throw acquired.error;
    }
    this.leases.set(taskId, acquired.value);
    return true;
  }

  private async renewLeases(): Promise<void> {
    for (const [taskId, lease] of this.leases) {
      const renewed = await lease.renew();
      if (renewed.isErr()) {
        this.log.error({ taskId, err: renewed.error }, "lease lost, abandoning task");
        this.leases.delete(taskId);
      }
    }
  }

  private armConfirmationTimer(taskId: string, delayMs: number): void {
    this.clearConfirmationTimer(taskId);
    const timer = setTimeout(() => {
      this.queue
        .run(taskId, () => this.onConfirmationTimeout(taskId))
        .catch((e) => this.log.error({ err: e, taskId }, "confirmation timeout handling failed"));
    }, delayMs);
    this.confirmationTimers.set(taskId, timer);
  }

  private clearConfirmationTimer(taskId: string): void {
    const timer = this.confirmationTimers.get(taskId);
    if (timer) clearTimeout(timer);
    this.confirmationTimers.delete(taskId);
  }

  private async rejectPlan(plan: Plan): Promise<void> {
    const rejected = changePlanStatus(plan, "REJECTED");
    if (rejected.isOk()) await this.savePlan(rejected.value);
  }

  private async moveTo(task: Task, to: TaskStatus, changes: Partial<Task> = {}): Promise<Task> {
    const moved = transitionTask(task, to);
    if (moved.isErr()) throw moved.error;
    return this.save({ ...moved.value, ...changes });
  }

  private async save(task: Task): Promise<Task> {
    const updated = await this.deps.store.updateTask(task.id, task);
    if (updated.isErr()) throw updated.error;
    return updated.value;
  }

  private async savePlan(plan: Plan): Promise<void> {
    const saved = await this.deps.store.savePlan(plan);
    if (saved.isErr()) throw saved.error;
  }

  private async findTask(taskId: string): Promise<Result<Task, OrchestratorError>> {
    const found = await this.deps.store.getTask(taskId);
    if (found.isErr()) {
      if (found.error.code === "NOT_FOUND") {
        return err(new OrchestratorError(`Task not found: ${taskId}`, "NOT_FOUND"));
      }
      throw found.error;
    }
    return ok(found.value);
  }

  private async loadTask(taskId: string): Promise<Task> {
    const found = await this.deps.store.getTask(taskId);
    if (found.isErr()) throw found.error;
    return found.value;
  }

  private async loadPlan(taskId: string, planId: string): Promise<Plan> {
    const found = await this.deps.store.getPlan(taskId, planId);
    if (found.isErr()) throw found.error;
    return found.value;
  }

  private async trace(entry: TraceEntry): Promise<void> {
    const written = await this.deps.store.appendTrace(entry);
    if (written.isErr()) {
      this.log.warn({ err: written.error, taskId: entry.taskId }, "trace write failed");
    }
  }
}

const PLANNING_CODES: readonly ErrorCode[] = [
  "PlanCycleError",
  "MissingCompensationError",
  "PlanValidationError",
  "UnsupportedActionError",
];

function toErrorCode(code: string): ErrorCode {
  return PLANNING_CODES.find((c) => c === code) ?? "PlanValidationError";
}
