import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { GraphMemoryStore } from "../../../src/memory/graph-store.js";
import { applyMemorySeed, loadMemorySeed, parseMemorySeed } from "../../../src/memory/seed.js";
import { plan, result, step } from "../helpers/fixtures.js";
import type { Task } from "@intentflow/shared";
import { createTask } from "../../../src/domain/task.js";

const seedPath = path.resolve(import.meta.dirname, "../../../../config/memory-seed.yaml");

const weights = { relevance: 0.6, recency: 0.25, centrality: 0.15, halfLifeMs: 60_000 };

describe("GraphMemoryStore", () => {
  let tmpDir: string;
  let clock: number;
  const now = () => new Date(clock);

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "memory-test-"));
    clock = Date.parse("2026-01-01T00:00:00.000Z");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  // ── Versioning ────────────────────────────────────

  it("should append a new version on update and keep the old one", async () => {
    const store = new GraphMemoryStore({ weights, journalPath: null, now });
    await store.upsertNode({ id: "doc", type: "document", name: "budget plan", properties: { owner: "ana" } });
    clock += 1_000;
    await store.upsertNode({ id: "doc", type: "document", name: "budget plan", properties: { status: "final" } });

    const history = store.nodeHistory("doc");
    expect(history.map((n) => n.version)).toEqual([1, 2]);
    expect(store.getNode("doc")?.properties).toEqual({ owner: "ana", status: "final" });
    expect(store.getNode("doc")?.keywords).toEqual(["budget", "plan"]);
    expect(store.getNode("doc")?.createdAt).toBe("2026-01-01T00:00:00.000Z");
    expect(store.getNode("doc")?.updatedAt).toBe("2026-01-01T00:00:01.000Z");
  });

  it("should let a newer edge supersede an older one", async () => {
    const store = new GraphMemoryStore({ weights, journalPath: null, now });
    await store.link("a", "b", "uses", 0.8);
    expect(store.liveEdges().map((e) => e.confidence)).toEqual([0.8]);

    await store.link("a", "b", "uses", 0);
    expect(store.liveEdges()).toEqual([]);
  });

  // ── Journal ───────────────────────────────────────

  it("should replay its journal and skip malformed lines", async () => {
    const journalPath = path.join(tmpDir, "nested", "graph.jsonl");
    const first = new GraphMemoryStore({ weights, journalPath, now });
    expect((await first.open()).isOk()).toBe(true);
    await first.upsertNode({ id: "doc", type: "document", name: "report" });
    await first.upsertNode({ id: "doc", type: "document", name: "report v2" });
    await first.link("role:analyst", "doc", "owns");
    await fs.appendFile(journalPath, "not json\n", "utf-8");

    const second = new GraphMemoryStore({ weights, journalPath, now });
    expect((await second.open()).isOk()).toBe(true);

    expect(second.getNode("doc")?.name).toBe("report v2");
    expect(second.nodeHistory("doc")).toHaveLength(2);
    expect(second.liveEdges().map((e) => e.type)).toEqual(["owns"]);
  });

  it("should open without a journal file", async () => {
    const store = new GraphMemoryStore({ weights, journalPath: path.join(tmpDir, "none.jsonl"), now });
    expect((await store.open()).isOk()).toBe(true);
    expect(store.liveNodes()).toEqual([]);
  });

  // ── Recording ─────────────────────────────────────

  it("should record an execution as task, step and entity nodes", async () => {
    const store = new GraphMemoryStore({ weights, journalPath: null, now });
    const task: Task = {
      ...createTask({ intent: "update quarterly report", roleScope: "analyst" }),
      id: "task-1",
      status: "COMPLETED",
      planId: "plan-1",
      planVersion: 1,
    };

    const recorded = await store.recordExecution({
      task,
      plan: plan([step("s1", 0)]),
      results: [result("s1", 1)],
    });

    expect(recorded.isOk()).toBe(true);
    expect(store.getNode("role:analyst")?.type).toBe("role");
    expect(store.getNode("task:task-1")?.properties).toEqual({
      status: "COMPLETED",
      planId: "plan-1",
      completeness: null,
    });
    expect(store.getNode("step:s1")?.properties["outcome"]).toBe("SUCCESS");
    expect(store.getNode("entity:report")?.name).toBe("report");
    expect(
      store
        .liveEdges()
        .map((e) => `${e.from} ${e.type} ${e.to}`)
        .sort(),
    ).toEqual([
      "role:analyst performed task:task-1",
      "role:analyst uses entity:report",
      "step:s1 acts_on entity:report",
      "task:task-1 has_step step:s1",
    ]);
  });

  // ── Seed ──────────────────────────────────────────

  it("should apply the configured seed and rank from it", async () => {
    const store = new GraphMemoryStore({ weights, journalPath: null, now });
    const applied = await loadMemorySeed(store, seedPath);
    expect(applied.isOk() && applied.value).toBe(5);

    const context = await store.retrieveContext({
      roleScope: "analyst",
      queryTerms: ["quarterly", "report"],
      limit: 10,
    });
    expect(context.isOk() && context.value.map((r) => r.entity.id)).toEqual([
      "entity:quarterly-report",
    ]);
  });

  it("should reject a seed node without an id", () => {
    const seed = parseMemorySeed({ nodes: [{ type: "document", name: "x" }] });
    expect(seed.isErr()).toBe(true);
  });

  it("should add a version when a seed is applied again", async () => {
    const store = new GraphMemoryStore({ weights, journalPath: null, now });
    const seed = parseMemorySeed({ nodes: [{ id: "doc", type: "document", name: "doc" }] });
    if (seed.isErr()) throw seed.error;

    await applyMemorySeed(store, seed.value);
    await applyMemorySeed(store, seed.value);

    expect(store.getNode("doc")?.version).toBe(2);
  });
});
