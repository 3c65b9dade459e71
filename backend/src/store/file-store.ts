import { ok, err, Result } from "neverthrow";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { nanoid } from "nanoid";
import type {
  AuditEntry,
  FeedbackRecord,
  Plan,
  StepResult,
  Task,
  TraceEntry,
} from "@intentflow/shared";
import type { IStateStore, TaskFilter } from "./interface.js";
import { StoreError } from "./interface.js";
import { applyTaskFilter } from "./filter.js";

// ─── File Store Implementation ──────────────────────────

/**
 * Layout under `baseDir`:
 *
 *   tasks/<taskId>/task.json
 *   tasks/<taskId>/plans/<planId>.json
 *   tasks/<taskId>/results.jsonl
 *   tasks/<taskId>/audit.jsonl
 *   tasks/<taskId>/feedback.jsonl
 *   tasks/<taskId>/trace.jsonl
 */
export class FileStore implements IStateStore {
  constructor(private readonly baseDir: string) {}

  // ── Lifecycle ───────────────────────────────────────

  async initialize(): Promise<Result<void, StoreError>> {
    try {
      await fs.mkdir(path.join(this.baseDir, "tasks"), { recursive: true });
      return ok(undefined);
    } catch (e) {
      return err(
        new StoreError(`Failed to initialize store: ${String(e)}`, "IO_ERROR"),
      );
    }
  }

  // ── Task Operations ─────────────────────────────────

  async createTask(task: Task): Promise<Result<Task, StoreError>> {
    const taskDir = this.taskDir(task.id);
    try {
      await fs.mkdir(path.dirname(taskDir), { recursive: true });
      await fs.mkdir(taskDir);
    } catch (e) {
      if (this.hasCode(e, "EEXIST")) {
        return err(
          new StoreError(`Task ${task.id} already exists`, "ALREADY_EXISTS"),
        );
      }
      return err(
        new StoreError(`Failed to create task: ${String(e)}`, "IO_ERROR"),
      );
    }
    const result = await this.writeJson(path.join(taskDir, "task.json"), task);
    if (result.isErr()) return err(result.error);
    return ok(task);
  }

  async getTask(taskId: string): Promise<Result<Task, StoreError>> {
    return this.readJson<Task>(path.join(this.taskDir(taskId), "task.json"));
  }

  async updateTask(
    taskId: string,
    updates: Partial<Task>,
  ): Promise<Result<Task, StoreError>> {
    const existing = await this.getTask(taskId);
    if (existing.isErr()) return existing;

    const updated = { ...existing.value, ...updates, id: taskId };
    const result = await this.writeJson(
      path.join(this.taskDir(taskId), "task.json"),
      updated,
    );
    if (result.isErr()) return err(result.error);
    return ok(updated);
  }

  async listTasks(filter?: TaskFilter): Promise<Result<Task[], StoreError>> {
    let entries: string[];
    try {
      entries = await fs.readdir(path.join(this.baseDir, "tasks"));
    } catch (e) {
      if (this.hasCode(e, "ENOENT")) return ok([]);
      return err(
        new StoreError(`Failed to list tasks: ${String(e)}`, "IO_ERROR"),
      );
    }

    const tasks: Task[] = [];
    for (const entry of entries) {
      const result = await this.getTask(entry);
      if (result.isOk()) {
        tasks.push(result.value);
      }
    }
    return ok(applyTaskFilter(tasks, filter));
  }

  // ── Plan Operations ─────────────────────────────────

  async savePlan(plan: Plan): Promise<Result<Plan, StoreError>> {
    const result = await this.writeJson(this.planFile(plan.taskId, plan.id), plan);
    if (result.isErr()) return err(result.error);
    return ok(plan);
  }

  async getPlan(
    taskId: string,
    planId: string,
  ): Promise<Result<Plan, StoreError>> {
    return this.readJson<Plan>(this.planFile(taskId, planId));
  }

  async listPlansByTask(taskId: string): Promise<Result<Plan[], StoreError>> {
    const plansDir = path.join(this.taskDir(taskId), "plans");
    let entries: string[];
    try {
      entries = await fs.readdir(plansDir);
    } catch (e) {
      if (this.hasCode(e, "ENOENT")) return ok([]);
      return err(
        new StoreError(`Failed to list plans: ${String(e)}`, "IO_ERROR"),
      );
    }

    const plans: Plan[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(".json")) continue;
      const result = await this.readJson<Plan>(path.join(plansDir, entry));
      if (result.isErr()) return err(result.error);
      plans.push(result.value);
    }
    plans.sort((a, b) => a.version - b.version);
    return ok(plans);
  }

  // ── Append-only Logs ────────────────────────────────

  async appendStepResult(result: StepResult): Promise<Result<void, StoreError>> {
    return this.appendLine(result.taskId, "results.jsonl", result);
  }

  async getStepResults(taskId: string): Promise<Result<StepResult[], StoreError>> {
    return this.readLines<StepResult>(taskId, "results.jsonl");
  }

  async appendAudit(entry: AuditEntry): Promise<Result<void, StoreError>> {
    return this.appendLine(entry.taskId, "audit.jsonl", entry);
  }

  async getAudit(taskId: string): Promise<Result<AuditEntry[], StoreError>> {
    return this.readLines<AuditEntry>(taskId, "audit.jsonl");
  }

  async appendFeedback(record: FeedbackRecord): Promise<Result<void, StoreError>> {
    return this.appendLine(record.taskId, "feedback.jsonl", record);
  }

  async getFeedback(taskId: string): Promise<Result<FeedbackRecord[], StoreError>> {
    return this.readLines<FeedbackRecord>(taskId, "feedback.jsonl");
  }

  async appendTrace(entry: TraceEntry): Promise<Result<void, StoreError>> {
    return this.appendLine(entry.taskId, "trace.jsonl", entry);
  }

  async getTraces(taskId: string): Promise<Result<TraceEntry[], StoreError>> {
    return this.readLines<TraceEntry>(taskId, "trace.jsonl");
  }

  // ── Private Helpers ─────────────────────────────────

  private taskDir(taskId: string): string {
    return path.join(this.baseDir, "tasks", taskId);
  }

  private planFile(taskId: string, planId: string): string {
    return path.join(this.taskDir(taskId), "plans", `${planId}.json`);
  }

  private async atomicWrite(filePath: string, content: string): Promise<void> {
    const tmpPath = `${filePath}.tmp.${nanoid(8)}`;
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, filePath);
  }

  private async writeJson<T>(
    filePath: string,
    data: T,
  ): Promise<Result<void, StoreError>> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await this.atomicWrite(filePath, JSON.stringify(data, null, 2));
      return ok(undefined);
    } catch (e) {
      return err(
        new StoreError(`Failed to write ${filePath}: ${String(e)}`, "IO_ERROR"),
      );
    }
  }

  private async readJson<T>(filePath: string): Promise<Result<T, StoreError>> {
    try {
      const content = await fs.readFile(filePath, "utf-8");
      return ok(JSON.parse(content) as T);
    } catch (e) {
      if (this.hasCode(e, "ENOENT")) {
        return err(new StoreError(`File not found: ${filePath}`, "NOT_FOUND"));
      }
      return err(
        new StoreError(`Failed to read ${filePath}: ${String(e)}`, "IO_ERROR"),
      );
    }
  }

  private async appendLine(
    taskId: string,
    file: string,
    data: unknown,
  ): Promise<Result<void, StoreError>> {
    const filePath = path.join(this.taskDir(taskId), file);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.appendFile(filePath, JSON.stringify(data) + "\n", "utf-8");
      return ok(undefined);
    } catch (e) {
      return err(
        new StoreError(`Failed to append ${file}: ${String(e)}`, "IO_ERROR"),
      );
    }
  }

  private async readLines<T>(
    taskId: string,
    file: string,
  ): Promise<Result<T[], StoreError>> {
    const filePath = path.join(this.taskDir(taskId), file);
    try {
      const content = await fs.readFile(filePath, "utf-8");
      const entries = content
        .split("\n")
        .filter((line) => line.trim().length > 0)
        .map((line) => JSON.parse(line) as T);
      return ok(entries);
    } catch (e) {
      if (this.hasCode(e, "ENOENT")) {
        return ok([]);
      }
      return err(
        new StoreError(`Failed to read ${file}: ${String(e)}`, "IO_ERROR"),
      );
    }
  }

  private hasCode(e: unknown, code: string): boolean {
    return typeof e === "object" && e !== null && "code" in e && e.code === code;
  }
}
