import type { ActionCategory, AgentMessage } from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import { BusAgent } from "../agents/bus-agent.js";
import type { HealthRegistry } from "../agents/agent-health.js";
import type { MessageBus } from "../bus/message-bus.js";
import { readPayload } from "../bus/envelope.js";
import { FeedbackPayloadSchema, StepResultPayloadSchema } from "../bus/payloads.js";
import { TOPICS } from "../bus/topics.js";
import type { IStateStore } from "../store/interface.js";
import type { LearningModel } from "./learning.js";

/** Feeds step results and human feedback into the learning model. */
export class LearningAgent extends BusAgent {
  private readonly categoriesByTask = new Map<string, Set<ActionCategory>>();

  constructor(
    bus: MessageBus,
    health: HealthRegistry,
    private readonly model: LearningModel,
    private readonly store: IStateStore,
  ) {
    super(AGENT_IDS.learning, bus, health);
  }

  protected subscribeAll(): void {
    this.consume(TOPICS.stepResults, async (m) => this.onResult(m));
    this.consume(TOPICS.feedback, (m) => this.onFeedback(m));
  }

  private onResult(message: AgentMessage): void {
    const payload = readPayload(message, "STEP_RESULT", StepResultPayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping step result");
      return;
    }
    const result = payload.value;
    this.model.observeResult(result);
    if (result.kind === "action") {
      const seen = this.categoriesByTask.get(result.taskId) ?? new Set<ActionCategory>();
      seen.add(result.category);
      this.categoriesByTask.set(result.taskId, seen);
    }
  }

  private async onFeedback(message: AgentMessage): Promise<void> {
    const payload = readPayload(message, "FEEDBACK", FeedbackPayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping feedback");
      return;
    }
    const record = payload.value;
    const categories = await this.categoriesOf(record.taskId);
    this.model.observeFeedback(record, categories);
    this.log.info(
      { taskId: record.taskId, rating: record.humanRating, categories: [...categories] },
      "feedback applied",
    );
  }

  /** Categories seen on the bus, else those in the stored results. */
  private async categoriesOf(taskId: string): Promise<Set<ActionCategory>> {
    const seen = this.categoriesByTask.get(taskId);
    if (seen) return seen;
    const stored = await this.store.getStepResults(taskId);
    if (stored.isErr()) throw stored.error;
    return new Set(stored.value.filter((r) => r.kind === "action").map((r) => r.category));
  }
}
