import { ok, err, Result } from "neverthrow";
import type { ActionCategory } from "@intentflow/shared";
import { ACTION_CATEGORIES } from "@intentflow/shared";
import { StepExecutionError } from "../../../src/domain/errors.js";
import type {
  ExecutionOutput,
  ExecutionRequest,
  StepExecutor,
} from "../../../src/execution/capability-registry.js";

/**
 * Records every request it receives. Actions named in `failing` fail with
 * a retryable error on every attempt; actions that are held do not answer
 * until released, and ignore the abort signal meanwhile.
 */
export class RecordingExecutor implements StepExecutor {
  readonly name = "recording";
  readonly calls: ExecutionRequest[] = [];
  readonly failing = new Set<string>();
  private readonly held = new Map<string, Promise<void>>();

  constructor(readonly categories: readonly ActionCategory[] = ACTION_CATEGORIES) {}

  async execute(request: ExecutionRequest): Promise<Result<ExecutionOutput, StepExecutionError>> {
    this.calls.push(request);
    const hold = this.held.get(request.action.name);
    if (hold) await hold;
    if (this.failing.has(request.action.name)) {
      return err(new StepExecutionError(`${request.action.name} refused`, request.stepId, true));
    }
    return ok({ done: request.action.name });
  }

  /** Holds every call of `actionName` until the returned function runs. */
  hold(actionName: string): () => void {
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = () => {
        this.held.delete(actionName);
        resolve();
      };
    });
    this.held.set(actionName, gate);
    return release;
  }

  /** `name:kind:attempt` per call, in arrival order. */
  log(): string[] {
    return this.calls.map((c) => `${c.action.name}:${c.kind}:${c.attempt}`);
  }
}
