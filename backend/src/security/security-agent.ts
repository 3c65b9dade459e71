import type { AgentMessage } from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import { BusAgent } from "../agents/bus-agent.js";
import type { HealthRegistry } from "../agents/agent-health.js";
import type { MessageBus } from "../bus/message-bus.js";
import { createMessage, readPayload } from "../bus/envelope.js";
import {
  SecurityRequestPayloadSchema,
  type ConfirmationNotice,
} from "../bus/payloads.js";
import { TOPICS } from "../bus/topics.js";
import type { SecurityGate } from "./security-gate.js";

export class SecurityAgent extends BusAgent {
  constructor(
    bus: MessageBus,
    health: HealthRegistry,
    private readonly gate: SecurityGate,
  ) {
    super(AGENT_IDS.security, bus, health);
  }

  protected subscribeAll(): void {
    this.consume(TOPICS.securityRequests, (m) => this.onPlan(m));
  }

  private async onPlan(message: AgentMessage): Promise<void> {
    const payload = readPayload(message, "PLAN_PROPOSED", SecurityRequestPayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping security request");
      return;
    }

    const evaluated = await this.gate.evaluate(payload.value.plan);
    if (evaluated.isErr()) {
      throw evaluated.error;
    }
    const { decision, plan } = evaluated.value;
    this.log.info(
      { taskId: plan.taskId, planId: plan.id, decision: decision.decision, risk: decision.aggregateRiskScore },
      "plan evaluated",
    );

    this.send(
      TOPICS.orchestratorInbox,
      createMessage({
        senderId: this.agentId,
        receiverId: AGENT_IDS.orchestrator,
        messageType: "SECURITY_DECISION",
        payload: { decision, plan },
        correlationId: message.correlationId,
        priority: message.priority,
      }),
    );

    if (decision.confirmation) {
      const notice: ConfirmationNotice = {
        taskId: decision.taskId,
        planId: decision.planId,
        token: decision.confirmation.token,
        expiresAt: decision.confirmation.expiresAt,
        aggregateRiskScore: decision.aggregateRiskScore,
        reason: decision.reason,
      };
      this.send(
        TOPICS.notifications,
        createMessage({
          senderId: this.agentId,
          receiverId: AGENT_IDS.user,
          messageType: "SECURITY_DECISION",
          payload: notice,
          correlationId: message.correlationId,
          priority: 1,
        }),
      );
    }
  }
}
