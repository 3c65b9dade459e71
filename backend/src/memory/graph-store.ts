import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ok, err, Result } from "neverthrow";
import { nanoid } from "nanoid";
import type {
  MemoryEdge,
  MemoryNode,
  MemoryQuery,
  RankedMemoryNode,
  StepResult,
} from "@intentflow/shared";
import { MemoryNodeSchema } from "@intentflow/shared";
import { z } from "zod";
import { MemoryUnavailableError } from "../domain/errors.js";
import { createLogger, type Logger } from "../logger.js";
import type {
  ExecutionRecord,
  MemoryProvider,
  NodeInput,
} from "./provider.js";
import { memoryIds } from "./provider.js";
import { rankNodes, type RankingWeights } from "./ranking.js";

// ─── Journal ────────────────────────────────────────────

const MemoryEdgeSchema = z.object({
  id: z.string(),
  from: z.string(),
  to: z.string(),
  type: z.string(),
  confidence: z.number(),
  createdAt: z.string(),
});

const JournalLineSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("node"), node: MemoryNodeSchema }),
  z.object({ kind: z.literal("edge"), edge: MemoryEdgeSchema }),
]);

type JournalLine = z.infer<typeof JournalLineSchema>;

export interface GraphStoreOptions {
  weights: RankingWeights;
  /** Append-only journal replayed by open(); null keeps everything in memory. */
  journalPath: string | null;
  now?: () => Date;
}

function tokenize(text: string): string[] {
  return [
    ...new Set(
      text
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter((w) => w.length > 2),
    ),
  ];
}

// ─── Graph Memory Store ─────────────────────────────────

/**
 * Versioned relationship graph. Nothing is deleted: a node update appends
 * a new version, and a new edge with the same from/to/type supersedes the
 * previous one.
 */
export class GraphMemoryStore implements MemoryProvider {
  private readonly log: Logger = createLogger("memory-store");
  private readonly history = new Map<string, MemoryNode[]>();
  private readonly edges = new Map<string, MemoryEdge[]>();
  private readonly now: () => Date;
  private writes: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: GraphStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async open(): Promise<Result<void, MemoryUnavailableError>> {
    const file = this.options.journalPath;
    if (!file) return ok(undefined);
    let content: string;
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      content = await fs.readFile(file, "utf-8");
    } catch (e) {
      if (typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT") {
        return ok(undefined);
      }
      return err(new MemoryUnavailableError(`cannot read journal: ${String(e)}`));
    }

    let skipped = 0;
    for (const line of content.split("\n")) {
      if (line.trim().length === 0) continue;
      const parsed = this.parseLine(line);
      if (!parsed) {
        skipped++;
        continue;
      }
      if (parsed.kind === "node") {
        this.pushNode(parsed.node);
      } else {
        this.pushEdge(parsed.edge);
      }
    }
    if (skipped > 0) {
      this.log.warn({ skipped }, "skipped malformed memory journal lines");
    }
    return ok(undefined);
  }

  // ── Queries ─────────────────────────────────────────

  async retrieveContext(
    query: MemoryQuery,
  ): Promise<Result<RankedMemoryNode[], MemoryUnavailableError>> {
    return ok(
      rankNodes(
        this.liveNodes(),
        this.liveEdges(),
        query,
        memoryIds.role(query.roleScope),
        this.options.weights,
        this.now().getTime(),
      ),
    );
  }

  getNode(id: string): MemoryNode | undefined {
    return this.history.get(id)?.at(-1);
  }

  nodeHistory(id: string): readonly MemoryNode[] {
    return this.history.get(id) ?? [];
  }

  liveNodes(): MemoryNode[] {
    const nodes: MemoryNode[] = [];
    for (const versions of this.history.values()) {
      const latest = versions.at(-1);
      if (latest) nodes.push(latest);
    }
    return nodes;
  }

  /** Latest edge per from/to/type. */
  liveEdges(): MemoryEdge[] {
    const edges: MemoryEdge[] = [];
    for (const versions of this.edges.values()) {
      const latest = versions.at(-1);
      if (latest && latest.confidence > 0) edges.push(latest);
    }
    return edges;
  }

  // ── Writes ──────────────────────────────────────────

  async upsertNode(input: NodeInput): Promise<Result<MemoryNode, MemoryUnavailableError>> {
    const timestamp = this.now().toISOString();
    const previous = input.id ? this.getNode(input.id) : undefined;
    const node: MemoryNode = {
      id: input.id ?? nanoid(12),
      type: input.type,
      name: input.name,
      properties: { ...previous?.properties, ...input.properties },
      keywords: input.keywords ?? previous?.keywords ?? tokenize(input.name),
      contextRoles: input.contextRoles ?? previous?.contextRoles ?? [],
      confidence: input.confidence ?? previous?.confidence ?? 1,
      version: (previous?.version ?? 0) + 1,
      createdAt: previous?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };

    const written = await this.persist({ kind: "node", node });
    if (written.isErr()) return err(written.error);
    this.pushNode(node);
    return ok(node);
  }

  async link(
    from: string,
    to: string,
    type: string,
    confidence = 1,
  ): Promise<Result<MemoryEdge, MemoryUnavailableError>> {
    const edge: MemoryEdge = {
      id: nanoid(12),
      from,
      to,
      type,
      confidence: Math.min(1, Math.max(0, confidence)),
      createdAt: this.now().toISOString(),
    };
    const written = await this.persist({ kind: "edge", edge });
    if (written.isErr()) return err(written.error);
    this.pushEdge(edge);
    return ok(edge);
  }

  async recordStepResult(result: StepResult): Promise<Result<void, MemoryUnavailableError>> {
    const activity = await this.upsertNode({
      id: memoryIds.activity(result),
      type: "activity",
      name: `${result.category} ${result.kind} ${result.outcome.toLowerCase()}`,
      properties: {
        taskId: result.taskId,
        stepId: result.stepId,
        attempt: result.attempt,
        outcome: result.outcome,
        durationMs: result.durationMs,
        ...(result.error ? { error: result.error } : {}),
      },
      keywords: [result.category, result.outcome.toLowerCase()],
    });
    if (activity.isErr()) return err(activity.error);

    const edge = await this.link(activity.value.id, memoryIds.task(result.taskId), "part_of");
    if (edge.isErr()) return err(edge.error);
    return ok(undefined);
  }

  async recordExecution(record: ExecutionRecord): Promise<Result<void, MemoryUnavailableError>> {
    const { task, plan, results } = record;
    const roleId = memoryIds.role(task.roleScope);
    const writes: Array<() => Promise<Result<unknown, MemoryUnavailableError>>> = [];

    if (!this.getNode(roleId)) {
      writes.push(() =>
        this.upsertNode({ id: roleId, type: "role", name: task.roleScope, contextRoles: [task.roleScope] }),
      );
    }

    const taskId = memoryIds.task(task.id);
    writes.push(() =>
      this.upsertNode({
        id: taskId,
        type: "task",
        name: task.intent,
        properties: {
          status: task.status,
          planId: task.planId,
          completeness: task.failure?.completeness ?? null,
        },
        keywords: tokenize(task.intent),
        contextRoles: [task.roleScope],
      }),
    );
    writes.push(() => this.link(roleId, taskId, "performed"));

    for (const step of plan?.steps ?? []) {
      const stepNodeId = memoryIds.step(step.id);
      const last = [...results]
        .reverse()
        .find((r) => r.stepId === step.id && r.kind === "action");
      const entityId = memoryIds.entity(step.action.target);
      writes.push(() =>
        this.upsertNode({
          id: stepNodeId,
          type: "step",
          name: step.action.label,
          properties: {
            action: step.action.name,
            category: step.action.category,
            target: step.action.target,
            outcome: last?.outcome ?? "NOT_RUN",
          },
          keywords: [step.action.name, step.action.category, ...tokenize(step.action.target)],
          contextRoles: [task.roleScope],
        }),
      );
      writes.push(() => this.link(taskId, stepNodeId, "has_step"));
      if (step.action.target.length > 0) {
        writes.push(() =>
          this.upsertNode({
            id: entityId,
            type: this.getNode(entityId)?.type ?? "entity",
            name: this.getNode(entityId)?.name ?? step.action.target,
          }),
        );
        writes.push(() => this.link(stepNodeId, entityId, "acts_on"));
        writes.push(() => this.link(roleId, entityId, "uses", 0.5));
      }
    }

    for (const write of writes) {
      const result = await write();
      if (result.isErr()) return err(result.error);
    }
    return ok(undefined);
  }

  // ── Private Helpers ─────────────────────────────────

  private pushNode(node: MemoryNode): void {
    const versions = this.history.get(node.id);
    if (versions) versions.push(node);
    else this.history.set(node.id, [node]);
  }

  private pushEdge(edge: MemoryEdge): void {
    const key = `${edge.from}|${edge.to}|${edge.type}`;
    const versions = this.edges.get(key);
    if (versions) versions.push(edge);
    else this.edges.set(key, [edge]);
  }

  private persist(line: JournalLine): Promise<Result<void, MemoryUnavailableError>> {
    const file = this.options.journalPath;
    if (!file) return Promise.resolve(ok(undefined));
    const write = this.writes.then(async (): Promise<Result<void, MemoryUnavailableError>> => {
      try {
        await fs.appendFile(file, JSON.stringify(line) + "\n", "utf-8");
        return ok(undefined);
      } catch (e) {
        return err(new MemoryUnavailableError(`journal append failed: ${String(e)}`));
      }
    });
    this.writes = write;
    return write;
  }

  private parseLine(line: string): JournalLine | null {
    try {
      const parsed = JournalLineSchema.safeParse(JSON.parse(line));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }
}
