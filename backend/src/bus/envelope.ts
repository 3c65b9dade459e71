import { nanoid } from "nanoid";
import { ok, err, Result } from "neverthrow";
import type { z } from "zod";
import type { AgentMessage, MessageType } from "@intentflow/shared";

export interface MessageInit<P> {
  senderId: string;
  receiverId: string;
  messageType: MessageType;
  payload: P;
  correlationId: string;
  priority?: number;
}

export function createMessage<P>(init: MessageInit<P>): AgentMessage<P> {
  return {
    id: nanoid(16),
    senderId: init.senderId,
    receiverId: init.receiverId,
    messageType: init.messageType,
    payload: init.payload,
    priority: init.priority ?? 3,
    timestamp: new Date().toISOString(),
    correlationId: init.correlationId,
  };
}

export class PayloadError extends Error {
  constructor(
    public readonly messageType: MessageType,
    detail: string,
  ) {
    super(`Invalid ${messageType} payload: ${detail}`);
    this.name = "PayloadError";
  }
}

/** Checks the envelope type and validates the payload against its schema. */
export function readPayload<S extends z.ZodTypeAny>(
  message: AgentMessage,
  expected: MessageType,
  schema: S,
): Result<z.output<S>, PayloadError> {
  if (message.messageType !== expected) {
    return err(
      new PayloadError(expected, `unexpected message type ${message.messageType}`),
    );
  }
  const parsed = schema.safeParse(message.payload);
  if (!parsed.success) {
    return err(
      new PayloadError(
        expected,
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      ),
    );
  }
  return ok(parsed.data);
}
