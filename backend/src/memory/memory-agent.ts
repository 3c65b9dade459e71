import type { AgentMessage } from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import { BusAgent } from "../agents/bus-agent.js";
import type { HealthRegistry } from "../agents/agent-health.js";
import type { MessageBus } from "../bus/message-bus.js";
import { createMessage, readPayload } from "../bus/envelope.js";
import {
  MemoryQueryPayloadSchema,
  StepResultPayloadSchema,
  type MemoryResultPayload,
} from "../bus/payloads.js";
import { TOPICS } from "../bus/topics.js";
import type { MemoryProvider } from "./provider.js";

/** Serves context queries and records step results as activity nodes. */
export class MemoryAgent extends BusAgent {
  constructor(
    bus: MessageBus,
    health: HealthRegistry,
    private readonly memory: MemoryProvider,
  ) {
    super(AGENT_IDS.memory, bus, health);
  }

  protected subscribeAll(): void {
    this.consume(TOPICS.memoryRequests, (m) => this.onQuery(m));
    this.consume(TOPICS.stepResults, (m) => this.onStepResult(m));
  }

  private async onQuery(message: AgentMessage): Promise<void> {
    const payload = readPayload(message, "MEMORY_QUERY", MemoryQueryPayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping memory query");
      return;
    }

    const { requestId, query } = payload.value;
    const result = await this.memory.retrieveContext(query);
    const reply: MemoryResultPayload = result.isOk()
      ? { requestId, nodes: result.value, error: null }
      : { requestId, nodes: [], error: result.error.message };

    this.send(
      TOPICS.memoryResults,
      createMessage({
        senderId: this.agentId,
        receiverId: message.senderId,
        messageType: "MEMORY_RESULT",
        payload: reply,
        correlationId: message.correlationId,
        priority: message.priority,
      }),
    );
  }

  private async onStepResult(message: AgentMessage): Promise<void> {
    const payload = readPayload(message, "STEP_RESULT", StepResultPayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping step result");
      return;
    }
    const recorded = await this.memory.recordStepResult(payload.value);
    if (recorded.isErr()) {
      // Surfacing the error makes the bus redeliver once the store recovers.
      throw recorded.error;
    }
  }
}
