import { ok, err, Result } from "neverthrow";
import { nanoid } from "nanoid";
import type { PendingConfirmation } from "@intentflow/shared";

export type ConfirmationErrorCode = "INVALID" | "EXPIRED" | "USED" | "NOT_PENDING";

export class ConfirmationError extends Error {
  constructor(
    message: string,
    public readonly code: ConfirmationErrorCode,
  ) {
    super(message);
    this.name = "ConfirmationError";
  }
}

interface IssuedToken {
  token: string;
  planId: string;
  expiresAt: number;
  state: "pending" | "used" | "expired";
}

/**
 * Single-use confirmation tokens, one live token per task. A token is
 * spent by its first successful use or by expiry, whichever comes first.
 */
export class ConfirmationTokens {
  private readonly issued = new Map<string, IssuedToken>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  issue(taskId: string, planId: string): PendingConfirmation {
    const token: IssuedToken = {
      token: nanoid(24),
      planId,
      expiresAt: this.now() + this.ttlMs,
      state: "pending",
    };
    this.issued.set(taskId, token);
    return { token: token.token, expiresAt: new Date(token.expiresAt).toISOString() };
  }

  /** Returns the plan the token approves. */
  consume(taskId: string, token: string): Result<string, ConfirmationError> {
    const issued = this.issued.get(taskId);
    if (!issued) {
      return err(new ConfirmationError(`Task ${taskId} has no pending confirmation`, "NOT_PENDING"));
    }
    if (issued.token !== token) {
      return err(new ConfirmationError("Confirmation token is invalid", "INVALID"));
    }
    if (issued.state === "used") {
      return err(new ConfirmationError("Confirmation token was already used", "USED"));
    }
    if (issued.state === "expired" || this.now() >= issued.expiresAt) {
      issued.state = "expired";
      return err(new ConfirmationError("Confirmation token has expired", "EXPIRED"));
    }
    issued.state = "used";
    return ok(issued.planId);
  }

  /** Marks the task's token expired. Returns false if it was no longer pending. */
  expire(taskId: string): boolean {
    const issued = this.issued.get(taskId);
    if (!issued || issued.state !== "pending") return false;
    issued.state = "expired";
    return true;
  }

  pending(taskId: string): { planId: string; expiresAt: string } | null {
    const issued = this.issued.get(taskId);
    if (!issued || issued.state !== "pending") return null;
    return { planId: issued.planId, expiresAt: new Date(issued.expiresAt).toISOString() };
  }
}
