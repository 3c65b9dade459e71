import type { AgentMessage, RankedMemoryNode, StepDraft } from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import { BusAgent } from "../agents/bus-agent.js";
import type { HealthRegistry } from "../agents/agent-health.js";
import type { MessageBus } from "../bus/message-bus.js";
import { createMessage, readPayload } from "../bus/envelope.js";
import {
  PlanRequestPayloadSchema,
  type PlanProposedPayload,
} from "../bus/payloads.js";
import { TOPICS } from "../bus/topics.js";
import type { ContextSource } from "../memory/provider.js";
import type { Planner } from "./planner.js";

export interface PlanningAgentConfig {
  contextLimit: number;
  stopwords: ReadonlySet<string>;
}

export function queryTermsOf(intent: string, stopwords: ReadonlySet<string>): string[] {
  const terms = intent
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((w) => w.length > 2 && !stopwords.has(w));
  return [...new Set(terms)];
}

/**
 * Answers plan requests. Context comes from memory; when memory does not
 * answer in time the plan is still built, from an empty bundle, and
 * flagged `contextDegraded`.
 */
export class PlanningAgent extends BusAgent {
  constructor(
    bus: MessageBus,
    health: HealthRegistry,
    private readonly planner: Planner,
    private readonly context: ContextSource,
    private readonly config: PlanningAgentConfig,
  ) {
    super(AGENT_IDS.planning, bus, health);
  }

  protected subscribeAll(): void {
    this.consume(TOPICS.planningRequests, (m) => this.onPlanRequest(m));
  }

  private async onPlanRequest(message: AgentMessage): Promise<void> {
    const payload = readPayload(message, "TASK_REQUEST", PlanRequestPayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping plan request");
      return;
    }
    const request = payload.value;

    let contextDegraded = false;
    let drafts: StepDraft[];
    if (request.drafts) {
      drafts = request.drafts;
    } else {
      let bundle: RankedMemoryNode[] = [];
      const context = await this.context.retrieveContext(
        {
          roleScope: request.roleScope,
          queryTerms: queryTermsOf(request.intent, this.config.stopwords),
          limit: this.config.contextLimit,
        },
        request.taskId,
      );
      if (context.isOk()) {
        bundle = context.value;
      } else {
        contextDegraded = true;
        this.log.warn(
          { taskId: request.taskId, reason: context.error.message },
          "planning with degraded context",
        );
      }

      const decomposed = this.planner.decompose(request.intent, bundle);
      if (decomposed.isErr()) {
        this.reply(message, {
          taskId: request.taskId,
          plan: null,
          error: {
            code: decomposed.error.code,
            message: decomposed.error.message,
            stepId: decomposed.error.stepId,
          },
        });
        return;
      }
      drafts = decomposed.value;
    }

    const plan = this.planner.buildPlan(
      { id: request.taskId, planVersion: request.planVersion },
      drafts,
      { contextDegraded, supersedes: request.supersedes },
    );

    if (plan.isErr()) {
      this.log.info(
        { taskId: request.taskId, code: plan.error.code },
        "plan rejected during validation",
      );
      this.reply(message, {
        taskId: request.taskId,
        plan: null,
        error: {
          code: plan.error.code,
          message: plan.error.message,
          stepId: plan.error.stepId,
        },
      });
      return;
    }

    this.reply(message, { taskId: request.taskId, plan: plan.value, error: null });
  }

  private reply(request: AgentMessage, payload: PlanProposedPayload): void {
    this.send(
      TOPICS.orchestratorInbox,
      createMessage({
        senderId: this.agentId,
        receiverId: AGENT_IDS.orchestrator,
        messageType: "PLAN_PROPOSED",
        payload,
        correlationId: request.correlationId,
        priority: request.priority,
      }),
    );
  }
}
