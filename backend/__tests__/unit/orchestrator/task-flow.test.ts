import { describe, it, expect, afterEach, vi } from "vitest";
import type { ConfirmationNotice } from "../../../src/bus/payloads.js";
import type { Runtime } from "../../../src/runtime.js";
import type { InMemoryStore } from "../helpers/in-memory-store.js";
import { startTestRuntime, testConfig, waitForStatus, type TestRuntime } from "../helpers/runtime.js";

const QUARTERLY = "open quarterly report and email summary";

async function submit(runtime: Runtime, intent: string): Promise<string> {
  const submitted = await runtime.orchestrator.submit({ intent, roleScope: "analyst" });
  if (submitted.isErr()) throw submitted.error;
  return submitted.value.id;
}

async function noticeFor(
  runtime: Runtime,
  taskId: string,
  afterPlanId: string | null = null,
): Promise<ConfirmationNotice> {
  return vi.waitFor(
    () => {
      const notice = runtime.notifications.pending(taskId).find((n) => n.planId !== afterPlanId);
      if (!notice) throw new Error("no confirmation yet");
      return notice;
    },
    { timeout: 5_000, interval: 10 },
  );
}

async function awaitingConfirmation(ctx: TestRuntime, intent: string) {
  const taskId = await submit(ctx.runtime, intent);
  await waitForStatus(ctx.store, taskId, "AWAITING_CONFIRMATION");
  return { taskId, notice: await noticeFor(ctx.runtime, taskId) };
}

async function confirmed(ctx: TestRuntime, intent: string): Promise<string> {
  const { taskId, notice } = await awaitingConfirmation(ctx, intent);
  const result = await ctx.runtime.orchestrator.confirm(taskId, notice.token);
  if (result.isErr()) throw result.error;
  return taskId;
}

/** Resolves once the executor has been called `count` times for `actionName`. */
async function calledTimes(ctx: TestRuntime, actionName: string, count: number): Promise<void> {
  await vi.waitFor(
    () => {
      const seen = ctx.executor.calls.filter((c) => c.action.name === actionName).length;
      if (seen < count) throw new Error(`${actionName} called ${seen} time(s)`);
    },
    { timeout: 5_000, interval: 10 },
  );
}

async function actions(store: InMemoryStore, taskId: string): Promise<string[]> {
  const audit = await store.getAudit(taskId);
  if (audit.isErr()) throw audit.error;
  return audit.value.map((e) => `${e.action}:${e.decision}`);
}

describe("task flow", () => {
  let ctx: TestRuntime | null = null;

  afterEach(async () => {
    await ctx?.runtime.stop();
    ctx = null;
  });

  it("should run a read-only intent without asking", async () => {
    ctx = await startTestRuntime();
    const taskId = await submit(ctx.runtime, "open quarterly report");

    const task = await waitForStatus(ctx.store, taskId, "COMPLETED");

    expect(ctx.executor.log()).toEqual(["open_file:action:1"]);
    expect(task.failure).toBeNull();
    expect(await actions(ctx.store, taskId)).toEqual([
      "plan:evaluate:AUTO_APPROVED",
      "step:dispatch:open_file:AUTO_APPROVED",
    ]);

    const view = await ctx.runtime.orchestrator.view(taskId);
    expect(view.isOk() && view.value.plan?.version).toBe(1);
    expect(view.isOk() && view.value.lastStepResult?.outcome).toBe("SUCCESS");
  });

  it("should ask for confirmation, then run the steps in order", async () => {
    ctx = await startTestRuntime();
    const { taskId, notice } = await awaitingConfirmation(ctx, QUARTERLY);

    expect(notice.aggregateRiskScore).toBeCloseTo(0.5025);
    expect(ctx.executor.log()).toEqual([]);

    const confirmed = await ctx.runtime.orchestrator.confirm(taskId, notice.token);
    expect(confirmed.isOk()).toBe(true);
    expect(ctx.runtime.notifications.pending(taskId)).toEqual([]);

    await waitForStatus(ctx.store, taskId, "COMPLETED");
    expect(ctx.executor.log()).toEqual([
      "open_file:action:1",
      "extract_summary:action:1",
      "compose_email:action:1",
    ]);

    const report = await ctx.runtime.orchestrator.auditReport(taskId);
    expect(report.isOk() && report.value.verified).toBe(true);
    expect(report.isOk() && report.value.entries[0]?.action).toBe("plan:confirm");
  });

  it("should not accept the same token twice", async () => {
    ctx = await startTestRuntime();
    const { taskId, notice } = await awaitingConfirmation(ctx, QUARTERLY);

    const wrong = await ctx.runtime.orchestrator.confirm(taskId, "not-the-token");
    expect(wrong.isErr() && wrong.error.code).toBe("CONFLICT");

    await ctx.runtime.orchestrator.confirm(taskId, notice.token);
    const replay = await ctx.runtime.orchestrator.confirm(taskId, notice.token);
    expect(replay.isErr() && replay.error.code).toBe("CONFLICT");
  });

  it("should roll back and fail when the email step exhausts its retries", async () => {
    ctx = await startTestRuntime();
    ctx.executor.failing.add("compose_email");
    const { taskId, notice } = await awaitingConfirmation(ctx, QUARTERLY);

    await ctx.runtime.orchestrator.confirm(taskId, notice.token);
    const task = await waitForStatus(ctx.store, taskId, "FAILED");

    expect(ctx.executor.log()).toEqual([
      "open_file:action:1",
      "extract_summary:action:1",
      "compose_email:action:1",
      "compose_email:action:2",
      "compose_email:action:3",
    ]);
    expect(task.failure?.code).toBe("StepExecutionError");
    expect(task.failure?.message).toBe(
      'Step "Compose email with summary of quarterly report" failed after 3 attempt(s): compose_email refused',
    );
    expect(task.failure?.stepId).toBe(`${task.planId}:3-compose_email`);
    // The open and extract steps have nothing to undo.
    expect(task.failure?.completeness).toBe("partial");
  });

  it("should cancel a task that is waiting for confirmation", async () => {
    ctx = await startTestRuntime();
    const { taskId } = await awaitingConfirmation(ctx, QUARTERLY);

    const cancelled = await ctx.runtime.orchestrator.cancel(taskId, "changed my mind");

    expect(cancelled.isOk() && cancelled.value.status).toBe("CANCELLED");
    expect(ctx.runtime.gate.pendingConfirmation(taskId)).toBeNull();
    expect(ctx.runtime.notifications.pending()).toEqual([]);
    expect(await actions(ctx.store, taskId)).toEqual(["plan:withdrawn:REJECTED"]);
    expect(ctx.executor.log()).toEqual([]);

    const again = await ctx.runtime.orchestrator.cancel(taskId);
    expect(again.isErr() && again.error.code).toBe("CONFLICT");
  });

  it("should fail a task no rule can plan", async () => {
    ctx = await startTestRuntime();
    const taskId = await submit(ctx.runtime, "dance wildly");

    const task = await waitForStatus(ctx.store, taskId, "FAILED");
    expect(task.failure?.code).toBe("PlanValidationError");
    expect(ctx.executor.log()).toEqual([]);
  });

  it("should record finished tasks in memory and learn from feedback", async () => {
    ctx = await startTestRuntime(testConfig({ learning: { alpha: 0.5, window_ms: 0 } }));
    const taskId = await submit(ctx.runtime, "open quarterly report");
    await waitForStatus(ctx.store, taskId, "COMPLETED");

    const memory = ctx.runtime.memory;
    await vi.waitFor(() => {
      expect(memory.getNode(`task:${taskId}`)?.properties["status"]).toBe("COMPLETED");
    });

    const recorded = await ctx.runtime.orchestrator.feedback(taskId, {
      humanRating: 1,
      correctionNotes: "opened the wrong file",
    });
    expect(recorded.isOk()).toBe(true);

    const learning = ctx.runtime.learning;
    await vi.waitFor(() => {
      expect(learning.riskSignal("read", "internal")).toBeGreaterThan(0);
    });
  });

  it("should fail when a confirmation is not given in time", async () => {
    ctx = await startTestRuntime(testConfig({ security: { confirmation_ttl_ms: 50 } }));
    const taskId = await submit(ctx.runtime, QUARTERLY);

    const task = await waitForStatus(ctx.store, taskId, "FAILED");

    expect(task.failure?.code).toBe("ConfirmationTimeout");
    expect(ctx.runtime.gate.pendingConfirmation(taskId)).toBeNull();
    expect(ctx.runtime.notifications.pending(taskId)).toEqual([]);
    expect(ctx.executor.log()).toEqual([]);
  });

  it("should refuse a plan whose risk reaches the high threshold", async () => {
    ctx = await startTestRuntime();
    const taskId = await submit(ctx.runtime, "pay invoice");

    const task = await waitForStatus(ctx.store, taskId, "FAILED");

    expect(task.failure?.code).toBe("RiskExceeded");
    expect(task.failure?.message).toBe("Plan risk 0.900 exceeds high threshold 0.8");
    expect(task.failure?.stepId).toBe(`${task.planId}:1-make_payment`);
    expect(ctx.executor.log()).toEqual([]);
    const stored = await ctx.store.getPlan(taskId, task.planId ?? "");
    expect(stored.isOk() && stored.value.status).toBe("REJECTED");
  });

  it("should re-plan once after a failed step and supersede the first plan", async () => {
    ctx = await startTestRuntime(
      testConfig({ orchestrator: { max_replans: 1 }, security: { history_weight: 0 } }),
    );
    ctx.executor.failing.add("compose_email");
    const { taskId, notice } = await awaitingConfirmation(ctx, QUARTERLY);
    await ctx.runtime.orchestrator.confirm(taskId, notice.token);

    const second = await noticeFor(ctx.runtime, taskId, notice.planId);
    await ctx.runtime.orchestrator.confirm(taskId, second.token);
    const task = await waitForStatus(ctx.store, taskId, "FAILED");

    expect(task.replanCount).toBe(1);
    expect(task.planVersion).toBe(2);
    expect(task.failure?.code).toBe("StepExecutionError");
    const first = await ctx.store.getPlan(taskId, notice.planId);
    expect(first.isOk() && first.value.status).toBe("SUPERSEDED");
    const replacement = await ctx.store.getPlan(taskId, second.planId);
    expect(replacement.isOk() && replacement.value.supersedes).toBe(notice.planId);
    expect(ctx.executor.log().filter((c) => c.startsWith("compose_email"))).toHaveLength(6);
  });

  it("should drop a pending retry when cancelled while retrying", async () => {
    ctx = await startTestRuntime(testConfig({ planning: { default_backoff_base_ms: 5_000 } }));
    ctx.executor.failing.add("open_file");
    const taskId = await submit(ctx.runtime, "open quarterly report");
    await waitForStatus(ctx.store, taskId, "RETRYING");

    await ctx.runtime.orchestrator.cancel(taskId, "changed my mind");
    const task = await waitForStatus(ctx.store, taskId, "CANCELLED");

    expect(task.failure?.code).toBe("Cancelled");
    expect(task.failure?.message).toBe("changed my mind");
    expect(task.failure?.completeness).toBe("not_required");
    expect(ctx.executor.log()).toEqual(["open_file:action:1"]);
  });

  it("should undo a step that finishes after the task was cancelled", async () => {
    ctx = await startTestRuntime();
    const release = ctx.executor.hold("write_file");
    try {
      const taskId = await confirmed(ctx, "write quarterly report");
      await calledTimes(ctx, "write_file", 1);

      await ctx.runtime.orchestrator.cancel(taskId, "changed my mind");
      release();
      const task = await waitForStatus(ctx.store, taskId, "CANCELLED");

      expect(ctx.executor.log()).toEqual(["write_file:action:1", "restore_file:compensation:1"]);
      expect(task.failure?.code).toBe("Cancelled");
      expect(task.failure?.completeness).toBe("complete");
      expect(task.outcome?.completedSteps).toHaveLength(1);
      expect(task.outcome?.compensatedSteps).toHaveLength(1);
    } finally {
      release();
    }
  });

  // ── Result Watchdog ──────────────────────────────────

  it("should count a success that arrives after the result timeout", async () => {
    ctx = await startTestRuntime(
      testConfig({ execution: { step_timeout_ms: 100, result_timeout_ms: 150 } }),
    );
    const release = ctx.executor.hold("write_file");
    try {
      const taskId = await confirmed(ctx, "write quarterly report");
      await calledTimes(ctx, "write_file", 2);
      release();

      const task = await waitForStatus(ctx.store, taskId, "COMPLETED");
      expect(task.failure).toBeNull();
      expect(ctx.executor.log()).toEqual(["write_file:action:1", "write_file:action:2"]);
    } finally {
      release();
    }
  });

  it("should fail a step whose executor never answers", async () => {
    ctx = await startTestRuntime(
      testConfig({ execution: { step_timeout_ms: 100, result_timeout_ms: 150 } }),
    );
    const release = ctx.executor.hold("open_file");
    try {
      const taskId = await submit(ctx.runtime, "open quarterly report");

      const task = await waitForStatus(ctx.store, taskId, "FAILED");
      expect(task.failure?.code).toBe("StepExecutionError");
      expect(task.failure?.message).toBe(
        'Step "Open quarterly report" failed after 3 attempt(s): No result within 150ms',
      );
      expect(task.failure?.completeness).toBe("not_required");
      expect(ctx.executor.log()).toEqual([
        "open_file:action:1",
        "open_file:action:2",
        "open_file:action:3",
      ]);
    } finally {
      release();
    }
  });

  // ── Recovery ─────────────────────────────────────────

  it("should fail a task left awaiting confirmation by a previous process", async () => {
    const first = await startTestRuntime();
    ctx = first;
    const { taskId } = await awaitingConfirmation(first, QUARTERLY);
    await first.runtime.stop();

    ctx = await startTestRuntime(testConfig(), first.store);
    const task = await waitForStatus(ctx.store, taskId, "FAILED");

    expect(task.failure?.code).toBe("ConfirmationTimeout");
    expect(ctx.executor.log()).toEqual([]);
  });

  it("should re-dispatch a step left in flight by a previous process", async () => {
    const first = await startTestRuntime();
    ctx = first;
    const release = first.executor.hold("open_file");
    try {
      const taskId = await submit(first.runtime, "open quarterly report");
      await waitForStatus(first.store, taskId, "RUNNING");
      await calledTimes(first, "open_file", 1);
      await first.runtime.stop();

      ctx = await startTestRuntime(testConfig(), first.store);
      const task = await waitForStatus(ctx.store, taskId, "COMPLETED");

      expect(task.failure).toBeNull();
      expect(ctx.executor.log()).toEqual(["open_file:action:1"]);
    } finally {
      release();
    }
  });

  it("should carry a cancel requested before a restart through to rollback", async () => {
    const first = await startTestRuntime();
    ctx = first;
    const release = first.executor.hold("write_file");
    try {
      const taskId = await confirmed(first, "write quarterly report");
      await calledTimes(first, "write_file", 1);
      await first.runtime.orchestrator.cancel(taskId, "changed my mind");
      await first.runtime.stop();

      ctx = await startTestRuntime(testConfig(), first.store);
      const task = await waitForStatus(ctx.store, taskId, "CANCELLED");

      expect(task.failure?.code).toBe("Cancelled");
      expect(task.failure?.message).toBe("changed my mind");
      expect(task.failure?.completeness).toBe("complete");
      expect(ctx.executor.log()).toEqual(["write_file:action:1", "restore_file:compensation:1"]);
    } finally {
      release();
    }
  });
});
