import { ok, err, Result } from "neverthrow";
import { nanoid } from "nanoid";

// ─── Errors ─────────────────────────────────────────────

export type LeaseErrorCode = "HELD" | "LOST" | "IO_ERROR";

export class LeaseError extends Error {
  constructor(
    message: string,
    public readonly code: LeaseErrorCode,
  ) {
    super(message);
    this.name = "LeaseError";
  }
}

// ─── Types ──────────────────────────────────────────────

/** Exclusive right to mutate one task. Must be renewed before its TTL lapses. */
export interface LeaseHandle {
  readonly taskId: string;
  readonly ownerId: string;
  renew(): Promise<Result<void, LeaseError>>;
  release(): Promise<void>;
}

export interface TaskLeaseManager {
  acquire(taskId: string): Promise<Result<LeaseHandle, LeaseError>>;
  isHeld(taskId: string): Promise<boolean>;
}

export interface LeaseOptions {
  ttlMs: number;
  ownerId?: string;
  now?: () => number;
}

// ─── In-memory Backend ──────────────────────────────────

interface LeaseRecord {
  ownerId: string;
  token: string;
  expiresAt: number;
}

/** Shared between managers to model several owners in one process. */
export type LeaseTable = Map<string, LeaseRecord>;

export function createLeaseTable(): LeaseTable {
  return new Map();
}

/**
 * Single-process lease backend. An expired lease is treated as stale and
 * may be taken over by the next acquirer.
 */
export class InMemoryLeaseManager implements TaskLeaseManager {
  readonly ownerId: string;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    options: LeaseOptions,
    private readonly table: LeaseTable = createLeaseTable(),
  ) {
    this.ttlMs = options.ttlMs;
    this.ownerId = options.ownerId ?? nanoid(8);
    this.now = options.now ?? Date.now;
  }

  async acquire(taskId: string): Promise<Result<LeaseHandle, LeaseError>> {
    const current = this.table.get(taskId);
    if (current && current.expiresAt > this.now()) {
      return err(
        new LeaseError(
          `Task ${taskId} is leased by ${current.ownerId}`,
          "HELD",
        ),
      );
    }

    const record: LeaseRecord = {
      ownerId: this.ownerId,
      token: nanoid(12),
      expiresAt: this.now() + this.ttlMs,
    };
    this.table.set(taskId, record);

    const handle: LeaseHandle = {
      taskId,
      ownerId: this.ownerId,
      renew: async () => {
        const held = this.table.get(taskId);
        if (!held || held.token !== record.token) {
          return err(new LeaseError(`Lease on ${taskId} was lost`, "LOST"));
        }
        held.expiresAt = this.now() + this.ttlMs;
        return ok(undefined);
      },
      release: async () => {
        if (this.table.get(taskId)?.token === record.token) {
          this.table.delete(taskId);
        }
      },
    };
    return ok(handle);
  }

  async isHeld(taskId: string): Promise<boolean> {
    const current = this.table.get(taskId);
    return current !== undefined && current.expiresAt > this.now();
  }
}
