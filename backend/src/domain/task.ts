import { ok, err, Result } from "neverthrow";
import { nanoid } from "nanoid";
import type {
  Task,
  TaskFailure,
  TaskOutcome,
  TaskStatus,
  TaskPriority,
} from "@intentflow/shared";
import { TASK_TRANSITIONS, TERMINAL_TASK_STATUSES } from "@intentflow/shared";

// ─── Errors ─────────────────────────────────────────────

export class TransitionError extends Error {
  constructor(
    public readonly from: TaskStatus,
    public readonly to: TaskStatus,
  ) {
    super(`Invalid task transition: ${from} -> ${to}`);
    this.name = "TransitionError";
  }
}

// ─── State Machine ──────────────────────────────────────

export function isValidTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function validTransitions(from: TaskStatus): readonly TaskStatus[] {
  return TASK_TRANSITIONS[from];
}

export function transitionTask(
  task: Task,
  to: TaskStatus,
  now: Date = new Date(),
): Result<Task, TransitionError> {
  if (!isValidTransition(task.status, to)) {
    return err(new TransitionError(task.status, to));
  }
  return ok({
    ...task,
    status: to,
    updatedAt: now.toISOString(),
  });
}

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

// ─── Factory ────────────────────────────────────────────

export interface NewTaskInput {
  intent: string;
  roleScope: string;
  priority?: TaskPriority;
  tags?: string[];
}

export function createTask(input: NewTaskInput, now: Date = new Date()): Task {
  const id = nanoid(12);
  const timestamp = now.toISOString();
  return {
    id,
    intent: input.intent,
    roleScope: input.roleScope,
    priority: input.priority ?? 3,
    tags: input.tags ?? [],
    status: "PENDING",
    createdAt: timestamp,
    updatedAt: timestamp,
    correlationId: id,
    planId: null,
    planVersion: 0,
    replanCount: 0,
    failure: null,
    outcome: null,
  };
}

// ─── Helpers ────────────────────────────────────────────

export function attachPlan(task: Task, planId: string, version: number): Task {
  return {
    ...task,
    planId,
    planVersion: version,
  };
}

export function setTaskFailure(task: Task, failure: TaskFailure): Task {
  return { ...task, failure };
}

export function setTaskOutcome(task: Task, outcome: TaskOutcome): Task {
  return { ...task, outcome };
}
