import type {
  ActionDescriptor,
  StepOutcome,
  StepResult,
  StepResultKind,
} from "@intentflow/shared";

/** Identity of one delivery attempt; results are applied at most once per key. */
export function resultKey(
  taskId: string,
  stepId: string,
  kind: StepResultKind,
  attempt: number,
): string {
  return `${taskId}:${stepId}:${kind}:${attempt}`;
}

export function keyOf(result: StepResult): string {
  return resultKey(result.taskId, result.stepId, result.kind, result.attempt);
}

export interface ResultInput {
  taskId: string;
  stepId: string;
  attempt: number;
  kind: StepResultKind;
  action: ActionDescriptor;
  outcome: StepOutcome;
  output?: Record<string, unknown>;
  error?: string | null;
  retryable?: boolean;
  durationMs: number;
}

export function createStepResult(input: ResultInput, now: Date = new Date()): StepResult {
  return {
    taskId: input.taskId,
    stepId: input.stepId,
    attempt: input.attempt,
    kind: input.kind,
    outcome: input.outcome,
    output: input.output ?? {},
    error: input.error ?? null,
    retryable: input.retryable ?? input.outcome !== "SUCCESS",
    category: input.action.category,
    sensitivity: input.action.sensitivity,
    durationMs: input.durationMs,
    timestamp: now.toISOString(),
  };
}
