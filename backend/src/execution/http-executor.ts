import { ok, err, Result } from "neverthrow";
import type { ActionCategory, ToolKind, ToolSpec } from "@intentflow/shared";
import { StepExecutionError } from "../domain/errors.js";
import type {
  ExecutionOutput,
  ExecutionRequest,
  StepExecutor,
  ToolRunner,
} from "./capability-registry.js";
import { classifyError } from "./retry-policy.js";

// ─── HTTP Call ──────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * POSTs a JSON body and expects a JSON object back. 429 and 5xx are
 * retryable; other non-2xx statuses are permanent. Network errors are
 * classified by message.
 */
async function postJson(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  stepId: string,
  signal: AbortSignal,
): Promise<Result<ExecutionOutput, StepExecutionError>> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "content-type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    if (signal.aborted) {
      return err(new StepExecutionError(`Request aborted: ${message}`, stepId, true));
    }
    return err(
      new StepExecutionError(`Request failed: ${message}`, stepId, classifyError(message) === "TRANSIENT"),
    );
  }

  if (!response.ok) {
    const retryable = response.status === 429 || response.status >= 500;
    return err(new StepExecutionError(`Executor responded ${response.status}`, stepId, retryable));
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return err(new StepExecutionError(`Invalid executor response: ${message}`, stepId, false));
  }
  return ok(isRecord(payload) ? payload : { result: payload });
}

// ─── Executors ──────────────────────────────────────────

export interface HttpExecutorConfig {
  name: string;
  url: string;
  categories: ActionCategory[];
  actions?: string[];
  headers?: Record<string, string>;
}

/** Forwards step actions to an external collaborator over HTTP. */
export class HttpStepExecutor implements StepExecutor {
  readonly name: string;
  readonly categories: readonly ActionCategory[];
  readonly actions: readonly string[];

  constructor(private readonly config: HttpExecutorConfig) {
    this.name = config.name;
    this.categories = config.categories;
    this.actions = config.actions ?? [];
  }

  execute(
    request: ExecutionRequest,
    signal: AbortSignal,
  ): Promise<Result<ExecutionOutput, StepExecutionError>> {
    return postJson(this.config.url, request, this.config.headers ?? {}, request.stepId, signal);
  }
}

export class HttpToolRunner implements ToolRunner {
  constructor(
    readonly kind: ToolKind,
    private readonly url: string,
  ) {}

  run(
    tool: ToolSpec,
    request: ExecutionRequest,
    signal: AbortSignal,
  ): Promise<Result<ExecutionOutput, StepExecutionError>> {
    return postJson(
      this.url,
      {
        tool: tool.name,
        sandboxProfile: tool.sandboxProfile,
        parameters: request.action.parameters,
        taskId: request.taskId,
        stepId: request.stepId,
        attempt: request.attempt,
        kind: request.kind,
      },
      {},
      request.stepId,
      signal,
    );
  }
}

/** Acknowledges every action without side effects. */
export class DryRunExecutor implements StepExecutor {
  readonly name = "dry-run";

  constructor(readonly categories: readonly ActionCategory[]) {}

  async execute(request: ExecutionRequest): Promise<Result<ExecutionOutput, StepExecutionError>> {
    return ok({
      dryRun: true,
      action: request.action.name,
      target: request.action.target,
      kind: request.kind,
    });
  }
}
