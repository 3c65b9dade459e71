import { ok, err, Result } from "neverthrow";
import { nanoid } from "nanoid";
import type { MemoryQuery, RankedMemoryNode } from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import type { MessageBus, Subscription } from "../bus/message-bus.js";
import { createMessage, readPayload } from "../bus/envelope.js";
import { MemoryResultPayloadSchema } from "../bus/payloads.js";
import { TOPICS } from "../bus/topics.js";
import { MemoryUnavailableError } from "../domain/errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { ContextSource } from "./provider.js";

interface Pending {
  resolve: (result: Result<RankedMemoryNode[], MemoryUnavailableError>) => void;
  timer: NodeJS.Timeout;
}

/**
 * Request/response over the bus. Each client reads results under its own
 * consumer group and matches them to requests by requestId.
 */
export class BusMemoryClient implements ContextSource {
  private readonly log: Logger = createLogger("memory-client");
  private readonly pending = new Map<string, Pending>();
  private readonly group = `memory-client-${nanoid(6)}`;
  private subscription: Subscription | null = null;

  constructor(
    private readonly bus: MessageBus,
    private readonly senderId: string,
    private readonly timeoutMs: number,
  ) {}

  start(): void {
    if (this.subscription) return;
    this.subscription = this.bus.subscribe(TOPICS.memoryResults, this.group, (message) => {
      const payload = readPayload(message, "MEMORY_RESULT", MemoryResultPayloadSchema);
      if (payload.isErr()) {
        this.log.warn({ err: payload.error }, "dropping memory result");
        return;
      }
      const waiting = this.pending.get(payload.value.requestId);
      if (!waiting) return;
      this.pending.delete(payload.value.requestId);
      clearTimeout(waiting.timer);
      waiting.resolve(
        payload.value.error === null
          ? ok(payload.value.nodes)
          : err(new MemoryUnavailableError(payload.value.error)),
      );
    });
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
    for (const [id, waiting] of this.pending) {
      clearTimeout(waiting.timer);
      waiting.resolve(err(new MemoryUnavailableError("client stopped")));
      this.pending.delete(id);
    }
  }

  retrieveContext(
    query: MemoryQuery,
    correlationId?: string,
  ): Promise<Result<RankedMemoryNode[], MemoryUnavailableError>> {
    const requestId = nanoid(12);
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        resolve(err(new MemoryUnavailableError(`no reply within ${this.timeoutMs}ms`)));
      }, this.timeoutMs);
      this.pending.set(requestId, { resolve, timer });

      const published = this.bus.publish(
        TOPICS.memoryRequests,
        createMessage({
          senderId: this.senderId,
          receiverId: AGENT_IDS.memory,
          messageType: "MEMORY_QUERY",
          payload: { requestId, query },
          correlationId: correlationId ?? requestId,
        }),
      );
      if (published.isErr()) {
        clearTimeout(timer);
        this.pending.delete(requestId);
        resolve(err(new MemoryUnavailableError(published.error.message)));
      }
    });
  }
}
