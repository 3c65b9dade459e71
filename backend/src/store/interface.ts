import type { Result } from "neverthrow";
import type {
  AuditEntry,
  FeedbackRecord,
  Plan,
  StepResult,
  Task,
  TaskStatus,
  TraceEntry,
} from "@intentflow/shared";

// ─── Error Types ────────────────────────────────────────

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: StoreErrorCode,
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export type StoreErrorCode =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "IO_ERROR"
  | "VALIDATION_ERROR";

// ─── Filter Types ───────────────────────────────────────

export interface TaskFilter {
  status?: TaskStatus | TaskStatus[];
  limit?: number;
  offset?: number;
}

// ─── Store Interface ────────────────────────────────────

export interface IStateStore {
  // Task operations
  createTask(task: Task): Promise<Result<Task, StoreError>>;
  getTask(taskId: string): Promise<Result<Task, StoreError>>;
  updateTask(
    taskId: string,
    updates: Partial<Task>,
  ): Promise<Result<Task, StoreError>>;
  listTasks(filter?: TaskFilter): Promise<Result<Task[], StoreError>>;

  // Plan operations (a plan is rewritten only to change its status)
  savePlan(plan: Plan): Promise<Result<Plan, StoreError>>;
  getPlan(taskId: string, planId: string): Promise<Result<Plan, StoreError>>;
  listPlansByTask(taskId: string): Promise<Result<Plan[], StoreError>>;

  // Append-only logs
  appendStepResult(result: StepResult): Promise<Result<void, StoreError>>;
  getStepResults(taskId: string): Promise<Result<StepResult[], StoreError>>;

  appendAudit(entry: AuditEntry): Promise<Result<void, StoreError>>;
  getAudit(taskId: string): Promise<Result<AuditEntry[], StoreError>>;

  appendFeedback(record: FeedbackRecord): Promise<Result<void, StoreError>>;
  getFeedback(taskId: string): Promise<Result<FeedbackRecord[], StoreError>>;

  appendTrace(entry: TraceEntry): Promise<Result<void, StoreError>>;
  getTraces(taskId: string): Promise<Result<TraceEntry[], StoreError>>;

  // Lifecycle
  initialize(): Promise<Result<void, StoreError>>;
}
