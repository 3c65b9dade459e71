import { ok, err, Result } from "neverthrow";
import type {
  ActionCategory,
  ActionDescriptor,
  StepResultKind,
  ToolKind,
  ToolSpec,
} from "@intentflow/shared";
import { ToolSpecSchema } from "@intentflow/shared";
import { StepExecutionError } from "../domain/errors.js";
import type { CapabilityResolver } from "../planning/planner.js";

// ─── Types ──────────────────────────────────────────────

export interface ExecutionRequest {
  taskId: string;
  stepId: string;
  attempt: number;
  kind: StepResultKind;
  action: ActionDescriptor;
}

export type ExecutionOutput = Record<string, unknown>;

/** Something that can carry out actions for one or more categories. */
export interface StepExecutor {
  readonly name: string;
  readonly categories: readonly ActionCategory[];
  /** Action names this executor claims ahead of category matching. */
  readonly actions?: readonly string[];
  execute(
    request: ExecutionRequest,
    signal: AbortSignal,
  ): Promise<Result<ExecutionOutput, StepExecutionError>>;
}

/** Runs registered tools of one kind. */
export interface ToolRunner {
  readonly kind: ToolKind;
  run(
    tool: ToolSpec,
    request: ExecutionRequest,
    signal: AbortSignal,
  ): Promise<Result<ExecutionOutput, StepExecutionError>>;
}

export type RegistryErrorCode = "INVALID" | "DUPLICATE" | "NO_RUNNER" | "FULL";

export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: RegistryErrorCode,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "RegistryError";
  }
}

export interface RegistryLimits {
  maxExecutors: number;
  maxTools: number;
}

// ─── Parameter Check ────────────────────────────────────

export function checkToolParameters(
  tool: ToolSpec,
  parameters: Record<string, unknown>,
): string[] {
  const problems: string[] = [];
  for (const param of tool.parameters) {
    const value = parameters[param.name];
    if (value === undefined) {
      if (param.required) problems.push(`missing required parameter "${param.name}"`);
      continue;
    }
    if (typeof value !== param.type) {
      problems.push(`parameter "${param.name}" must be a ${param.type}`);
    }
  }
  return problems;
}

// ─── Capability Registry ────────────────────────────────

export class CapabilityRegistry implements CapabilityResolver {
  private readonly executors: StepExecutor[] = [];
  private readonly runners = new Map<ToolKind, ToolRunner>();
  private readonly tools = new Map<string, ToolSpec>();

  constructor(private readonly limits: RegistryLimits) {}

  registerExecutor(executor: StepExecutor): Result<void, RegistryError> {
    if (this.executors.some((e) => e.name === executor.name)) {
      return err(new RegistryError(`Executor already registered: ${executor.name}`, "DUPLICATE"));
    }
    if (this.executors.length >= this.limits.maxExecutors) {
      return err(new RegistryError(`Executor limit ${this.limits.maxExecutors} reached`, "FULL"));
    }
    this.executors.push(executor);
    return ok(undefined);
  }

  registerRunner(runner: ToolRunner): void {
    this.runners.set(runner.kind, runner);
  }

  /** Validates a raw ToolSpec and registers it. */
  registerTool(raw: unknown): Result<ToolSpec, RegistryError> {
    const parsed = ToolSpecSchema.safeParse(raw);
    if (!parsed.success) {
      return err(
        new RegistryError(
          "Invalid tool spec",
          "INVALID",
          parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
        ),
      );
    }
    const tool = parsed.data;
    if (this.tools.has(tool.name)) {
      return err(new RegistryError(`Tool already registered: ${tool.name}`, "DUPLICATE"));
    }
    if (!this.runners.has(tool.kind)) {
      return err(new RegistryError(`No runner available for ${tool.kind} tools`, "NO_RUNNER"));
    }
    if (this.tools.size >= this.limits.maxTools) {
      return err(new RegistryError(`Tool limit ${this.limits.maxTools} reached`, "FULL"));
    }
    this.tools.set(tool.name, tool);
    return ok(tool);
  }

  listTools(): ToolSpec[] {
    return [...this.tools.values()];
  }

  listExecutors(): Array<{ name: string; categories: ActionCategory[] }> {
    return this.executors.map((e) => ({ name: e.name, categories: [...e.categories] }));
  }

  /**
   * Resolution order: a registered tool of that name, an executor that
   * names the action, then the first executor covering the category.
   */
  resolve(action: ActionDescriptor): StepExecutor | null {
    const tool = this.tools.get(action.name);
    if (tool && tool.categories.includes(action.category)) {
      const runner = this.runners.get(tool.kind);
      if (runner) return toolExecutor(tool, runner);
    }
    const named = this.executors.find((e) => e.actions?.includes(action.name));
    if (named) return named;
    return this.executors.find((e) => e.categories.includes(action.category)) ?? null;
  }

  canHandle(action: ActionDescriptor): boolean {
    return this.resolve(action) !== null;
  }
}

function toolExecutor(tool: ToolSpec, runner: ToolRunner): StepExecutor {
  return {
    name: `tool:${tool.name}`,
    categories: tool.categories,
    actions: [tool.name],
    async execute(request, signal) {
      const problems = checkToolParameters(tool, request.action.parameters);
      if (problems.length > 0) {
        return err(
          new StepExecutionError(
            `Tool ${tool.name} rejected parameters: ${problems.join("; ")}`,
            request.stepId,
            false,
          ),
        );
      }
      return runner.run(tool, request, signal);
    },
  };
}
