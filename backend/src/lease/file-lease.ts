import * as lockfile from "proper-lockfile";
import * as path from "node:path";
import * as fs from "node:fs";
import { ok, err, Result } from "neverthrow";
import { nanoid } from "nanoid";
import { createLogger, type Logger } from "../logger.js";
import type { LeaseHandle, TaskLeaseManager } from "./task-lease.js";
import { LeaseError } from "./task-lease.js";

export interface FileLeaseOptions {
  /** Directory holding one `<taskId>.lock` per leased task. */
  directory: string;
  /** A lock whose mtime is older than this is stale and can be reclaimed. */
  ttlMs: number;
  ownerId?: string;
}

/**
 * Cross-process lease backend on proper-lockfile. The library refreshes
 * the lock's mtime in the background; a lock it fails to refresh is
 * reported as compromised and the next renew() returns LOST.
 */
export class FileLeaseManager implements TaskLeaseManager {
  readonly ownerId: string;
  private readonly log: Logger = createLogger("file-lease");

  constructor(private readonly options: FileLeaseOptions) {
    this.ownerId = options.ownerId ?? nanoid(8);
  }

  async acquire(taskId: string): Promise<Result<LeaseHandle, LeaseError>> {
    const target = this.lockTarget(taskId);
    let compromised: Error | null = null;

    try {
      await fs.promises.mkdir(this.options.directory, { recursive: true });
      const release = await lockfile.lock(target, {
        realpath: false,
        retries: 0,
        stale: this.options.ttlMs,
        onCompromised: (e) => {
          compromised = e;
          this.log.error({ err: e, taskId }, "task lease compromised");
        },
      });

      let released = false;
      return ok({
        taskId,
        ownerId: this.ownerId,
        renew: async () => {
          if (compromised || released) {
            return err(new LeaseError(`Lease on ${taskId} was lost`, "LOST"));
          }
          return ok(undefined);
        },
        release: async () => {
          if (released) return;
          released = true;
          if (compromised) return;
          try {
            await release();
          } catch (e) {
            this.log.warn({ err: e, taskId }, "lease release failed");
          }
        },
      });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      const held =
        typeof e === "object" && e !== null && "code" in e && e.code === "ELOCKED";
      return err(
        new LeaseError(
          `Failed to lease task ${taskId}: ${message}`,
          held ? "HELD" : "IO_ERROR",
        ),
      );
    }
  }

  async isHeld(taskId: string): Promise<boolean> {
    try {
      return await lockfile.check(this.lockTarget(taskId), {
        realpath: false,
        stale: this.options.ttlMs,
      });
    } catch (e) {
      this.log.warn({ err: e, taskId }, "lease check failed");
      return false;
    }
  }

  private lockTarget(taskId: string): string {
    return path.join(this.options.directory, taskId);
  }
}
