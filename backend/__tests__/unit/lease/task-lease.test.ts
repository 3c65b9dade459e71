import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  createLeaseTable,
  InMemoryLeaseManager,
  type LeaseHandle,
  type LeaseTable,
} from "../../../src/lease/task-lease.js";
import { FileLeaseManager } from "../../../src/lease/file-lease.js";

describe("InMemoryLeaseManager", () => {
  let table: LeaseTable;
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    table = createLeaseTable();
    clock = 1_000;
  });

  it("should grant exactly one of two concurrent acquisitions", async () => {
    const a = new InMemoryLeaseManager({ ttlMs: 1_000, ownerId: "a", now }, table);
    const b = new InMemoryLeaseManager({ ttlMs: 1_000, ownerId: "b", now }, table);

    const results = await Promise.all([a.acquire("task-1"), b.acquire("task-1")]);

    expect(results.filter((r) => r.isOk())).toHaveLength(1);
    const loser = results.find((r) => r.isErr());
    expect(loser?.isErr() && loser.error.code).toBe("HELD");
  });

  it("should let another owner take over an expired lease", async () => {
    const a = new InMemoryLeaseManager({ ttlMs: 1_000, ownerId: "a", now }, table);
    const b = new InMemoryLeaseManager({ ttlMs: 1_000, ownerId: "b", now }, table);

    const first = await a.acquire("task-1");
    expect(first.isOk()).toBe(true);

    clock += 1_001;
    expect(await b.isHeld("task-1")).toBe(false);
    const second = await b.acquire("task-1");
    expect(second.isOk() && second.value.ownerId).toBe("b");

    if (first.isOk()) {
      const renewed = await first.value.renew();
      expect(renewed.isErr() && renewed.error.code).toBe("LOST");
    }
  });

  it("should extend the lease on renew", async () => {
    const a = new InMemoryLeaseManager({ ttlMs: 1_000, ownerId: "a", now }, table);
    const b = new InMemoryLeaseManager({ ttlMs: 1_000, ownerId: "b", now }, table);
    const held = await a.acquire("task-1");
    if (held.isErr()) throw held.error;

    clock += 800;
    expect((await held.value.renew()).isOk()).toBe(true);
    clock += 800;

    expect((await b.acquire("task-1")).isErr()).toBe(true);
  });

  it("should free the task on release", async () => {
    const a = new InMemoryLeaseManager({ ttlMs: 1_000, ownerId: "a", now }, table);
    const held = await a.acquire("task-1");
    if (held.isErr()) throw held.error;

    await held.value.release();

    expect(await a.isHeld("task-1")).toBe(false);
    expect((await a.acquire("task-1")).isOk()).toBe(true);
  });
});

describe("FileLeaseManager", () => {
  let tmpDir: string;
  const handles: LeaseHandle[] = [];

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "lease-test-"));
  });

  afterEach(async () => {
    await Promise.all(handles.splice(0).map((h) => h.release()));
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should grant exactly one of two concurrent acquisitions", async () => {
    const a = new FileLeaseManager({ directory: tmpDir, ttlMs: 10_000, ownerId: "a" });
    const b = new FileLeaseManager({ directory: tmpDir, ttlMs: 10_000, ownerId: "b" });

    const results = await Promise.all([a.acquire("task-1"), b.acquire("task-1")]);
    for (const r of results) if (r.isOk()) handles.push(r.value);

    expect(results.filter((r) => r.isOk())).toHaveLength(1);
    const loser = results.find((r) => r.isErr());
    expect(loser?.isErr() && loser.error.code).toBe("HELD");
  });

  it("should report the lock as held until released", async () => {
    const a = new FileLeaseManager({ directory: tmpDir, ttlMs: 10_000 });
    const held = await a.acquire("task-1");
    if (held.isErr()) throw held.error;

    expect(await a.isHeld("task-1")).toBe(true);
    expect((await held.value.renew()).isOk()).toBe(true);

    await held.value.release();
    expect(await a.isHeld("task-1")).toBe(false);
    expect((await held.value.renew()).isErr()).toBe(true);

    const again = await a.acquire("task-1");
    expect(again.isOk()).toBe(true);
    if (again.isOk()) handles.push(again.value);
  });

  it("should keep leases on different tasks independent", async () => {
    const a = new FileLeaseManager({ directory: tmpDir, ttlMs: 10_000 });
    const results = await Promise.all([a.acquire("task-1"), a.acquire("task-2")]);
    for (const r of results) if (r.isOk()) handles.push(r.value);

    expect(results.every((r) => r.isOk())).toBe(true);
  });
});
