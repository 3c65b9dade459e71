import { describe, it, expect, beforeEach } from "vitest";
import { ok, Result } from "neverthrow";
import type { ActionCategory, ToolSpec } from "@intentflow/shared";
import {
  CapabilityRegistry,
  checkToolParameters,
  type ExecutionOutput,
  type ExecutionRequest,
  type StepExecutor,
  type ToolRunner,
} from "../../../src/execution/capability-registry.js";
import type { StepExecutionError } from "../../../src/domain/errors.js";
import { RecordingExecutor } from "../helpers/fake-executors.js";
import { action } from "../helpers/fixtures.js";

class EchoRunner implements ToolRunner {
  readonly kind = "script" as const;
  readonly runs: string[] = [];

  async run(tool: ToolSpec): Promise<Result<ExecutionOutput, StepExecutionError>> {
    this.runs.push(tool.name);
    return ok({ ran: tool.name });
  }
}

const rotateLogs = {
  name: "rotate_logs",
  description: "Rotates application logs",
  kind: "script",
  sandboxProfile: "isolated",
  categories: ["system"],
  parameters: [{ name: "keep", type: "number", required: true }],
};

function stub(name: string, categories: ActionCategory[], actions?: string[]): StepExecutor {
  return { name, categories, actions, execute: async () => ok({}) };
}

function request(name: string, parameters: Record<string, unknown>): ExecutionRequest {
  return {
    taskId: "task-1",
    stepId: "s1",
    attempt: 1,
    kind: "action",
    action: { ...action(name, "system"), parameters },
  };
}

describe("CapabilityRegistry", () => {
  let registry: CapabilityRegistry;
  let runner: EchoRunner;

  beforeEach(() => {
    registry = new CapabilityRegistry({ maxExecutors: 2, maxTools: 1 });
    runner = new EchoRunner();
    registry.registerRunner(runner);
  });

  // ── Executors ─────────────────────────────────────

  it("should resolve by category and report unsupported actions", () => {
    const reader = new RecordingExecutor(["read"]);
    registry.registerExecutor(reader);

    expect(registry.resolve(action("open_file", "read"))).toBe(reader);
    expect(registry.canHandle(action("send_money", "financial"))).toBe(false);
  });

  it("should prefer an executor that names the action", () => {
    registry.registerExecutor(new RecordingExecutor(["communicate"]));
    registry.registerExecutor(stub("mailer", ["communicate"], ["compose_email"]));

    expect(registry.resolve(action("compose_email", "communicate"))?.name).toBe("mailer");
    expect(registry.resolve(action("post_message", "communicate"))?.name).toBe("recording");
  });

  it("should refuse duplicate names and enforce the executor limit", () => {
    expect(registry.registerExecutor(new RecordingExecutor()).isOk()).toBe(true);
    const duplicate = registry.registerExecutor(new RecordingExecutor());
    expect(duplicate.isErr() && duplicate.error.code).toBe("DUPLICATE");

    registry.registerExecutor(stub("second", ["read"]));
    const third = registry.registerExecutor(stub("third", ["read"]));
    expect(third.isErr() && third.error.code).toBe("FULL");
  });

  // ── Tools ─────────────────────────────────────────

  it("should register a tool and resolve it ahead of executors", async () => {
    registry.registerExecutor(new RecordingExecutor(["system"]));
    const registered = registry.registerTool(rotateLogs);
    expect(registered.isOk() && registered.value.parameters[0]?.required).toBe(true);

    const executor = registry.resolve(action("rotate_logs", "system"));
    expect(executor?.name).toBe("tool:rotate_logs");

    const ran = await executor?.execute(request("rotate_logs", { keep: 3 }), new AbortController().signal);
    expect(ran?.isOk() && ran.value).toEqual({ ran: "rotate_logs" });
    expect(runner.runs).toEqual(["rotate_logs"]);
  });

  it("should not use a tool for a category it does not declare", () => {
    registry.registerTool(rotateLogs);
    expect(registry.resolve(action("rotate_logs", "read"))).toBeNull();
  });

  it("should reject tool parameters of the wrong shape without running", async () => {
    registry.registerTool(rotateLogs);
    const executor = registry.resolve(action("rotate_logs", "system"));

    const ran = await executor?.execute(request("rotate_logs", { keep: "all" }), new AbortController().signal);

    expect(ran?.isErr()).toBe(true);
    if (ran?.isErr()) {
      expect(ran.error.message).toBe('Tool rotate_logs rejected parameters: parameter "keep" must be a number');
      expect(ran.error.retryable).toBe(false);
    }
    expect(runner.runs).toEqual([]);
  });

  it("should list every issue of an invalid tool spec", () => {
    const invalid = registry.registerTool({ ...rotateLogs, name: "Rotate Logs", sandboxProfile: "trusted" });
    expect(invalid.isErr()).toBe(true);
    if (invalid.isErr()) {
      expect(invalid.error.code).toBe("INVALID");
      expect(invalid.error.issues).toEqual(["name: tool name must be snake_case"]);
    }
  });

  it("should refuse an unsafe script profile", () => {
    const invalid = registry.registerTool({ ...rotateLogs, sandboxProfile: "trusted" });
    expect(invalid.isErr() && invalid.error.issues).toEqual([
      "(root): script tools cannot run in the trusted sandbox profile",
    ]);
  });

  it("should refuse tools without a runner, duplicates and overflow", () => {
    const noRunner = registry.registerTool({ ...rotateLogs, kind: "integration" });
    expect(noRunner.isErr() && noRunner.error.code).toBe("NO_RUNNER");

    registry.registerTool(rotateLogs);
    const duplicate = registry.registerTool(rotateLogs);
    expect(duplicate.isErr() && duplicate.error.code).toBe("DUPLICATE");

    const overflow = registry.registerTool({ ...rotateLogs, name: "purge_cache" });
    expect(overflow.isErr() && overflow.error.code).toBe("FULL");
  });
});

describe("checkToolParameters", () => {
  it("should report missing required parameters only", () => {
    const tool: ToolSpec = {
      name: "t",
      description: "d",
      kind: "script",
      sandboxProfile: "isolated",
      categories: ["compute"],
      parameters: [
        { name: "a", type: "string", required: true },
        { name: "b", type: "boolean", required: false },
      ],
    };
    expect(checkToolParameters(tool, {})).toEqual(['missing required parameter "a"']);
    expect(checkToolParameters(tool, { a: "x", b: true })).toEqual([]);
  });
});
