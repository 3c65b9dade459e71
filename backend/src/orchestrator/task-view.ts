import type {
  Plan,
  StepResult,
  Task,
  TaskPriority,
  TaskStatus,
  TaskView,
} from "@intentflow/shared";
import { summarizePlan } from "../domain/plan.js";

export interface TaskSummary {
  taskId: string;
  status: TaskStatus;
  intent: string;
  roleScope: string;
  priority: TaskPriority;
  planId: string | null;
  createdAt: string;
  updatedAt: string;
}

export function summarizeTask(task: Task): TaskSummary {
  return {
    taskId: task.id,
    status: task.status,
    intent: task.intent,
    roleScope: task.roleScope,
    priority: task.priority,
    planId: task.planId,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  };
}

export function buildTaskView(
  task: Task,
  plan: Plan | null,
  lastStepResult: StepResult | null,
  pending: { expiresAt: string } | null,
): TaskView {
  return {
    taskId: task.id,
    status: task.status,
    intent: task.intent,
    roleScope: task.roleScope,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
    plan: plan ? summarizePlan(plan) : null,
    lastStepResult,
    failure: task.failure,
    outcome: task.outcome,
    awaitingConfirmation:
      task.status === "AWAITING_CONFIRMATION" && pending ? { expiresAt: pending.expiresAt } : null,
  };
}
