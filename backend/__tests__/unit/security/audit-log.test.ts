import { describe, it, expect, beforeEach } from "vitest";
import { AuditLog, GENESIS_HASH } from "../../../src/security/audit-log.js";
import { AuditIntegrityError } from "../../../src/domain/errors.js";
import { createInMemoryStore, type InMemoryStore } from "../helpers/in-memory-store.js";

function entry(taskId: string, action: string, riskScore = 0.2) {
  return {
    taskId,
    stepId: null,
    actor: "security-gate",
    action,
    riskScore,
    decision: "AUTO_APPROVED" as const,
  };
}

describe("AuditLog", () => {
  let store: InMemoryStore;
  let audit: AuditLog;

  beforeEach(() => {
    store = createInMemoryStore();
    audit = new AuditLog(store);
  });

  it("should chain entries from the genesis hash", async () => {
    await Promise.all([
      audit.append(entry("task-1", "a")),
      audit.append(entry("task-1", "b")),
      audit.append(entry("task-1", "c")),
    ]);

    const verified = await audit.verify("task-1");
    expect(verified.isOk()).toBe(true);
    if (!verified.isOk()) return;
    const entries = verified.value;
    expect(entries.map((e) => e.action)).toEqual(["a", "b", "c"]);
    expect(entries.map((e) => e.sequence)).toEqual([0, 1, 2]);
    expect(entries[0]?.prevHash).toBe(GENESIS_HASH);
    expect(entries[1]?.prevHash).toBe(entries[0]?.hash);
    expect(entries[2]?.prevHash).toBe(entries[1]?.hash);
  });

  it("should keep separate chains per task", async () => {
    await audit.append(entry("task-1", "a"));
    const other = await audit.append(entry("task-2", "a"));

    expect(other.isOk() && other.value.sequence).toBe(0);
    expect(other.isOk() && other.value.prevHash).toBe(GENESIS_HASH);
  });

  it("should continue an existing chain after a restart", async () => {
    const first = await audit.append(entry("task-1", "a"));
    const restarted = new AuditLog(store);

    const second = await restarted.append(entry("task-1", "b"));

    expect(second.isOk() && second.value.sequence).toBe(1);
    expect(second.isOk() && first.isOk() && second.value.prevHash === first.value.hash).toBe(true);
    expect((await restarted.verify("task-1")).isOk()).toBe(true);
  });

  it("should detect an edited entry", async () => {
    await audit.append(entry("task-1", "a"));
    await audit.append(entry("task-1", "b"));

    const raw = store.auditLog("task-1")[1];
    if (raw) raw.riskScore = 0.9;

    const verified = await audit.verify("task-1");
    expect(verified.isErr()).toBe(true);
    if (verified.isErr()) {
      expect(verified.error).toBeInstanceOf(AuditIntegrityError);
      expect(verified.error.message).toBe("Audit chain for task task-1 is broken at entry 1");
    }
  });

  it("should detect a removed entry", async () => {
    await audit.append(entry("task-1", "a"));
    await audit.append(entry("task-1", "b"));
    await audit.append(entry("task-1", "c"));

    store.auditLog("task-1").splice(1, 1);

    const verified = await audit.verify("task-1");
    expect(verified.isErr() && verified.error.message).toBe(
      "Audit chain for task task-1 is broken at entry 1",
    );
  });

  it("should verify an empty chain", async () => {
    const verified = await audit.verify("task-9");
    expect(verified.isOk() && verified.value).toEqual([]);
  });
});
