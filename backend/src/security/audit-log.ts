import { createHash } from "node:crypto";
import { ok, err, Result } from "neverthrow";
import { nanoid } from "nanoid";
import type { AuditDecision, AuditEntry } from "@intentflow/shared";
import { AuditIntegrityError } from "../domain/errors.js";
import type { IStateStore, StoreError } from "../store/interface.js";

export const GENESIS_HASH = "0".repeat(64);

export interface AuditInput {
  taskId: string;
  stepId: string | null;
  actor: string;
  action: string;
  riskScore: number;
  decision: AuditDecision;
}

/** JSON with sorted keys, so the hash does not depend on property order. */
function canonical(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonical).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonical(v)}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

export function hashEntry(entry: Omit<AuditEntry, "hash">): string {
  const { prevHash, ...body } = entry;
  return createHash("sha256").update(prevHash).update(canonical(body)).digest("hex");
}

/**
 * Per-task hash chain. Appends for one task are serialized; each entry
 * embeds the hash of its predecessor.
 */
export class AuditLog {
  private readonly tails = new Map<string, AuditEntry | null>();
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly store: IStateStore) {}

  append(input: AuditInput): Promise<Result<AuditEntry, StoreError>> {
    const prior = this.queues.get(input.taskId) ?? Promise.resolve();
    const next = prior.then(() => this.write(input));
    this.queues.set(
      input.taskId,
      next.then(
        () => undefined,
        () => undefined,
      ),
    );
    return next;
  }

  /** Recomputes the chain; any gap, reordering or edit fails verification. */
  async verify(
    taskId: string,
  ): Promise<Result<AuditEntry[], AuditIntegrityError | StoreError>> {
    await this.queues.get(taskId);
    const entries = await this.store.getAudit(taskId);
    if (entries.isErr()) return err(entries.error);

    let prevHash = GENESIS_HASH;
    for (const [index, entry] of entries.value.entries()) {
      const { hash, ...body } = entry;
      if (
        entry.taskId !== taskId ||
        entry.sequence !== index ||
        entry.prevHash !== prevHash ||
        hashEntry(body) !== hash
      ) {
        return err(new AuditIntegrityError(taskId, index));
      }
      prevHash = hash;
    }
    return ok(entries.value);
  }

  private async write(input: AuditInput): Promise<Result<AuditEntry, StoreError>> {
    let tail = this.tails.get(input.taskId);
    if (tail === undefined) {
      const loaded = await this.store.getAudit(input.taskId);
      if (loaded.isErr()) return err(loaded.error);
      tail = loaded.value.at(-1) ?? null;
    }

    const body: Omit<AuditEntry, "hash"> = {
      id: nanoid(12),
      taskId: input.taskId,
      sequence: tail ? tail.sequence + 1 : 0,
      stepId: input.stepId,
      actor: input.actor,
      action: input.action,
      riskScore: input.riskScore,
      decision: input.decision,
      timestamp: new Date().toISOString(),
      prevHash: tail ? tail.hash : GENESIS_HASH,
    };
    const entry: AuditEntry = { ...body, hash: hashEntry(body) };
    const written = await this.store.appendAudit(entry);
    if (written.isErr()) return err(written.error);
    this.tails.set(input.taskId, entry);
    return ok(entry);
  }
}
