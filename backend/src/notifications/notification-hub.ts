import { EventEmitter } from "node:events";
import type { AgentMessage } from "@intentflow/shared";
import { AGENT_IDS } from "@intentflow/shared";
import { BusAgent } from "../agents/bus-agent.js";
import type { HealthRegistry } from "../agents/agent-health.js";
import type { MessageBus } from "../bus/message-bus.js";
import { readPayload } from "../bus/envelope.js";
import {
  ConfirmationNoticePayloadSchema,
  type ConfirmationNotice,
} from "../bus/payloads.js";
import { TOPICS } from "../bus/topics.js";

export type NoticeListener = (notice: ConfirmationNotice) => void;

/** Whether the notice's token can still be spent. */
export type NoticeOpen = (notice: ConfirmationNotice) => boolean;

/**
 * The human side of the confirmation loop. Keeps the latest open notice
 * per task and fans new ones out to live listeners (SSE clients). A
 * notice closes when it expires or when `isOpen` says its token was
 * used, withdrawn or expired.
 */
export class NotificationHub extends BusAgent {
  private readonly emitter = new EventEmitter();
  private readonly latest = new Map<string, ConfirmationNotice>();

  constructor(
    bus: MessageBus,
    health: HealthRegistry,
    private readonly isOpen: NoticeOpen = () => true,
    private readonly now: () => number = Date.now,
  ) {
    super(AGENT_IDS.user, bus, health);
    this.emitter.setMaxListeners(100);
  }

  protected subscribeAll(): void {
    this.consume(TOPICS.notifications, async (m) => this.onNotice(m));
  }

  pending(taskId?: string): ConfirmationNotice[] {
    const now = this.now();
    const live: ConfirmationNotice[] = [];
    for (const [id, notice] of this.latest) {
      if (Date.parse(notice.expiresAt) <= now || !this.isOpen(notice)) {
        this.latest.delete(id);
        continue;
      }
      if (taskId === undefined || id === taskId) live.push(notice);
    }
    return live;
  }

  on(listener: NoticeListener): void {
    this.emitter.on("notice", listener);
  }

  off(listener: NoticeListener): void {
    this.emitter.off("notice", listener);
  }

  private onNotice(message: AgentMessage): void {
    const payload = readPayload(message, "SECURITY_DECISION", ConfirmationNoticePayloadSchema);
    if (payload.isErr()) {
      this.log.warn({ err: payload.error }, "dropping notification");
      return;
    }
    const notice = payload.value;
    if (!this.isOpen(notice)) {
      this.log.debug({ taskId: notice.taskId }, "confirmation already closed");
      return;
    }
    this.latest.set(notice.taskId, notice);
    this.log.info({ taskId: notice.taskId, expiresAt: notice.expiresAt }, "confirmation requested");
    this.emitter.emit("notice", notice);
  }
}
