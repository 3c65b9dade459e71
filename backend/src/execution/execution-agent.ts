import { err, type Result } from "neverthrow";
import type { AgentMessage, StepOutcome, StepResult } from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import { BusAgent } from "../agents/bus-agent.js";
import type { HealthRegistry } from "../agents/agent-health.js";
import type { MessageBus } from "../bus/message-bus.js";
import { createMessage, readPayload } from "../bus/envelope.js";
import {
  CancelPayloadSchema,
  StepDispatchPayloadSchema,
  type StepDispatchPayload,
} from "../bus/payloads.js";
import { TOPICS } from "../bus/topics.js";
import { StepExecutionError } from "../domain/errors.js";
import { createStepResult, resultKey } from "../domain/step-result.js";
import type {
  CapabilityRegistry,
  ExecutionOutput,
  StepExecutor,
} from "./capability-registry.js";
import { classifyError } from "./retry-policy.js";

interface Running {
  taskId: string;
  controller: AbortController;
  cancelled: boolean;
  done: Promise<void>;
}

/**
 * Runs dispatched steps against the capability registry and publishes
 * their results. Steps run detached from the delivery so that
 * parallel-safe steps of one task overlap; a lost run surfaces through
 * the orchestrator's result watchdog.
 */
export class ExecutionAgent extends BusAgent {
  private readonly running = new Map<string, Running>();

  constructor(
    bus: MessageBus,
    health: HealthRegistry,
    private readonly registry: CapabilityRegistry,
  ) {
    super(AGENT_IDS.execution, bus, health);
  }

  protected subscribeAll(): void {
    this.consume(TOPICS.executionSteps, async (m) => this.onDispatch(m));
    this.consume(TOPICS.executionControl, async (m) => this.onControl(m));
  }

  override stop(): void {
    for (const run of this.running.values()) {
      run.cancelled = true;
      run.controller.abort();
    }
    super.stop();
  }

  /** Resolves once every step started so far has reported. */
  async idle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running.values()].map((r) => r.done));
    }
  }

  get activeCount(): number {
    return this.running.size;
  }

  // ── Handlers ────────────────────────────────────────

  private onDispatch(message: AgentMessage): void {
    const payload = readPayload(message, "STEP_DISPATCH", StepDispatchPayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping step dispatch");
      return;
    }
    const dispatch = payload.value;
    const key = resultKey(dispatch.taskId, dispatch.stepId, dispatch.kind, dispatch.attempt);
    if (this.running.has(key)) {
      this.log.debug({ key }, "dispatch already running");
      return;
    }

    const controller = new AbortController();
    const entry: Running = {
      taskId: dispatch.taskId,
      controller,
      cancelled: false,
      done: Promise.resolve(),
    };
    entry.done = this.run(dispatch, entry, message.priority)
      .catch((e) => this.log.error({ err: e, key }, "step run failed"))
      .finally(() => this.running.delete(key));
    this.running.set(key, entry);
  }

  private onControl(message: AgentMessage): void {
    const payload = readPayload(message, "CANCEL", CancelPayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping control message");
      return;
    }
    let aborted = 0;
    for (const run of this.running.values()) {
      if (run.taskId !== payload.value.taskId) continue;
      run.cancelled = true;
      run.controller.abort();
      aborted++;
    }
    this.log.info({ taskId: payload.value.taskId, aborted }, "abort requested");
  }

  // ── Execution ───────────────────────────────────────

  private async run(dispatch: StepDispatchPayload, entry: Running, priority: number): Promise<void> {
    const { controller } = entry;
    const started = Date.now();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, dispatch.timeoutMs);

    let outcome: StepOutcome;
    let output: ExecutionOutput = {};
    let error: string | null = null;
    let retryable = false;

    try {
      const executor = this.registry.resolve(dispatch.action);
      const executed = executor
        ? await this.invoke(executor, dispatch, controller.signal)
        : null;

      // An executor that finished ok has had its effect, whatever aborted it meanwhile.
      if (executed === null) {
        outcome = "FAILED";
        error = `No executor for action ${dispatch.action.name} (${dispatch.action.category})`;
      } else if (executed.isOk()) {
        outcome = "SUCCESS";
        output = executed.value;
      } else if (timedOut) {
        outcome = "TIMEOUT";
        error = `Step timed out after ${dispatch.timeoutMs}ms`;
        retryable = true;
      } else if (entry.cancelled) {
        outcome = "FAILED";
        error = "Step aborted by cancellation";
      } else {
        outcome = "FAILED";
        error = executed.error.message;
        retryable = executed.error.retryable;
      }
    } finally {
      clearTimeout(timer);
    }

    const result = createStepResult({
      taskId: dispatch.taskId,
      stepId: dispatch.stepId,
      attempt: dispatch.attempt,
      kind: dispatch.kind,
      action: dispatch.action,
      outcome,
      output,
      error,
      retryable,
      durationMs: Date.now() - started,
    });
    this.publishResult(result, priority);
  }

  /** Converts a throwing executor into a failed result. */
  private async invoke(
    executor: StepExecutor,
    dispatch: StepDispatchPayload,
    signal: AbortSignal,
  ): Promise<Result<ExecutionOutput, StepExecutionError>> {
    try {
      return await executor.execute(dispatch, signal);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      return err(
        new StepExecutionError(message, dispatch.stepId, classifyError(message) === "TRANSIENT"),
      );
    }
  }

  private publishResult(result: StepResult, priority: number): void {
    const published = this.bus.publish(
      TOPICS.stepResults,
      createMessage({
        senderId: this.agentId,
        receiverId: AGENT_IDS.orchestrator,
        messageType: "STEP_RESULT",
        payload: result,
        correlationId: result.taskId,
        priority,
      }),
    );
    if (published.isErr()) {
      this.log.error({ err: published.error, stepId: result.stepId }, "could not publish step result");
      return;
    }
    this.health.markProcessed();
    this.log.info(
      { taskId: result.taskId, stepId: result.stepId, attempt: result.attempt, kind: result.kind, outcome: result.outcome },
      "step finished",
    );
  }
}
