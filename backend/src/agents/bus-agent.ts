import type { AgentMessage } from "@intentflow/shared";
import type {
  DeliveryInfo,
  MessageBus,
  Subscription,
} from "../bus/message-bus.js";
import { createLogger, type Logger } from "../logger.js";
import type { AgentHealth, HealthRegistry } from "./agent-health.js";

/**
 * Common wiring for agents: one consumer group per agent, health
 * bookkeeping around every handler call. A handler that throws leaves
 * the offset uncommitted, so the bus redelivers.
 */
export abstract class BusAgent {
  protected readonly log: Logger;
  protected readonly health: AgentHealth;
  private subscriptions: Subscription[] = [];

  constructor(
    readonly agentId: string,
    protected readonly bus: MessageBus,
    healthRegistry: HealthRegistry,
  ) {
    this.log = createLogger(agentId);
    this.health = healthRegistry.track(agentId);
  }

  protected abstract subscribeAll(): void;

  start(): void {
    if (this.subscriptions.length > 0) return;
    this.subscribeAll();
    this.health.markStarted();
  }

  stop(): void {
    for (const sub of this.subscriptions) sub.unsubscribe();
    this.subscriptions = [];
    this.health.markStopped();
  }

  protected consume(
    topic: string,
    handler: (message: AgentMessage, delivery: DeliveryInfo) => Promise<void>,
  ): void {
    const sub = this.bus.subscribe(topic, this.agentId, async (message, delivery) => {
      try {
        await handler(message, delivery);
        this.health.markProcessed();
      } catch (e) {
        const detail = e instanceof Error ? e.message : String(e);
        this.health.markError(detail);
        this.log.error(
          { err: e, topic, messageType: message.messageType, taskId: message.correlationId },
          "handler failed",
        );
        throw e;
      }
    });
    this.subscriptions.push(sub);
  }

  /** Publishes or throws, so a failed publish fails the current delivery. */
  protected send(topic: string, message: AgentMessage): void {
    const published = this.bus.publish(topic, message);
    if (published.isErr()) {
      throw published.error;
    }
  }
}
