import type { Result } from "neverthrow";
import type {
  MemoryEdge,
  MemoryNode,
  MemoryQuery,
  Plan,
  RankedMemoryNode,
  StepResult,
  Task,
} from "@intentflow/shared";
import type { MemoryUnavailableError } from "../domain/errors.js";

export interface NodeInput {
  /** Stable id; a new node gets a generated one. */
  id?: string;
  type: string;
  name: string;
  properties?: Record<string, unknown>;
  keywords?: string[];
  contextRoles?: string[];
  confidence?: number;
}

export interface ExecutionRecord {
  task: Task;
  plan: Plan | null;
  results: readonly StepResult[];
}

/** Read side, which planning needs. */
export interface ContextSource {
  retrieveContext(
    query: MemoryQuery,
    correlationId?: string,
  ): Promise<Result<RankedMemoryNode[], MemoryUnavailableError>>;
}

export interface MemoryProvider extends ContextSource {
  upsertNode(input: NodeInput): Promise<Result<MemoryNode, MemoryUnavailableError>>;
  link(
    from: string,
    to: string,
    type: string,
    confidence?: number,
  ): Promise<Result<MemoryEdge, MemoryUnavailableError>>;
  recordStepResult(result: StepResult): Promise<Result<void, MemoryUnavailableError>>;
  recordExecution(record: ExecutionRecord): Promise<Result<void, MemoryUnavailableError>>;
}

/** Conventional ids for nodes the store creates itself. */
export const memoryIds = {
  role: (roleScope: string): string => `role:${roleScope}`,
  task: (taskId: string): string => `task:${taskId}`,
  step: (stepId: string): string => `step:${stepId}`,
  entity: (target: string): string =>
    `entity:${target.toLowerCase().trim().replace(/\s+/g, "-")}`,
  activity: (result: StepResult): string =>
    `activity:${result.taskId}:${result.stepId}:${result.kind}:${result.attempt}`,
};
