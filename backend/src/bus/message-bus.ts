import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ok, err, Result } from "neverthrow";
import { nanoid } from "nanoid";
import type { AgentMessage } from "@intentflow/shared";
import { AgentMessageSchema } from "@intentflow/shared";
import { createLogger, type Logger } from "../logger.js";

// ─── Errors ─────────────────────────────────────────────

export class BusError extends Error {
  constructor(
    message: string,
    public readonly code: "CLOSED" | "IO_ERROR",
  ) {
    super(message);
    this.name = "BusError";
  }
}

// ─── Types ──────────────────────────────────────────────

export interface BusOptions {
  /** Partitions per topic. A correlationId always maps to the same partition. */
  partitions: number;
  /** Delay before a failed delivery is retried. */
  redeliveryDelayMs: number;
  /** Deliveries attempted before a message is dead-lettered. */
  maxDeliveries: number;
  /** When set, messages and committed offsets survive restarts. */
  journalDir: string | null;
}

export interface DeliveryInfo {
  topic: string;
  group: string;
  partition: number;
  offset: number;
  attempt: number;
}

export type MessageHandler = (
  message: AgentMessage,
  delivery: DeliveryInfo,
) => Promise<void> | void;

export interface Subscription {
  readonly topic: string;
  readonly group: string;
  unsubscribe(): void;
}

export interface DeadLetter {
  topic: string;
  group: string;
  partition: number;
  offset: number;
  message: AgentMessage;
  error: string;
}

export type BusObserver = (topic: string, message: AgentMessage) => void;

interface PartitionLog {
  /** Offset of entries[0]; entries below every group's commit are trimmed. */
  base: number;
  entries: AgentMessage[];
}

interface Member {
  id: string;
  handler: MessageHandler;
}

interface GroupState {
  members: Member[];
  /** Next offset to deliver, per partition. */
  committed: number[];
  pumping: boolean[];
}

interface JournalRecord {
  partition: number;
  offset: number;
  message: AgentMessage;
}

const DEFAULT_OPTIONS: BusOptions = {
  partitions: 8,
  redeliveryDelayMs: 100,
  maxDeliveries: 5,
  journalDir: null,
};

/** FNV-1a, so the partition of a key is stable across processes. */
export function partitionFor(key: string, partitions: number): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0) % partitions;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Message Bus ────────────────────────────────────────

/**
 * Topic-based, at-least-once transport.
 *
 * Each topic is split into partitions keyed by correlationId. Within a
 * consumer group a partition is owned by exactly one member, and its
 * messages are handed over one at a time in offset order. An offset is
 * committed only after the handler resolves; a throwing handler gets the
 * same message again after `redeliveryDelayMs`, up to `maxDeliveries`.
 */
export class MessageBus {
  private readonly options: BusOptions;
  private readonly log: Logger = createLogger("message-bus");
  private readonly logs = new Map<string, PartitionLog[]>();
  private readonly groups = new Map<string, Map<string, GroupState>>();
  private readonly storedOffsets = new Map<string, Map<string, number[]>>();
  private readonly observers = new Set<BusObserver>();
  private readonly active = new Set<Promise<void>>();
  private readonly dead: DeadLetter[] = [];
  private io: Promise<void> = Promise.resolve();
  private offsetsQueued = false;
  private closed = false;

  constructor(options: Partial<BusOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  // ── Lifecycle ───────────────────────────────────────

  /** Replays the journal, if any. Call before the first subscribe. */
  async open(): Promise<Result<void, BusError>> {
    const dir = this.options.journalDir;
    if (!dir) return ok(undefined);

    try {
      await fs.mkdir(dir, { recursive: true });
      for (const file of await fs.readdir(dir)) {
        if (!file.endsWith(".jsonl")) continue;
        const topic = file.slice(0, -".jsonl".length);
        const content = await fs.readFile(path.join(dir, file), "utf-8");
        for (const line of content.split("\n")) {
          if (line.trim().length === 0) continue;
          const record = this.parseRecord(line);
          if (!record) {
            this.log.warn({ topic }, "skipping malformed journal record");
            continue;
          }
          const log = this.partitionsOf(topic)[record.partition];
          if (log && record.offset === log.base + log.entries.length) {
            log.entries.push(record.message);
          }
        }
      }
      await this.loadOffsets(dir);
      return ok(undefined);
    } catch (e) {
      return err(new BusError(`Failed to open journal: ${String(e)}`, "IO_ERROR"));
    }
  }

  /** Waits until every partition of every group is idle. */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active]);
    }
  }

  /** Waits for pending journal and offset writes. */
  async flush(): Promise<void> {
    await this.io;
  }

  async close(): Promise<void> {
    this.closed = true;
    await Promise.all([...this.active]);
    await this.flush();
  }

  // ── Publish / Subscribe ─────────────────────────────

  /** Appends the message to its partition and returns the assigned offset. */
  publish(topic: string, message: AgentMessage): Result<number, BusError> {
    if (this.closed) {
      return err(new BusError("Bus is closed", "CLOSED"));
    }

    const partition = partitionFor(message.correlationId, this.options.partitions);
    const log = this.partitionsOf(topic)[partition];
    if (!log) {
      return err(new BusError(`No partition ${partition} on ${topic}`, "IO_ERROR"));
    }
    const offset = log.base + log.entries.length;
    log.entries.push(message);
    this.journal(topic, { partition, offset, message });

    for (const observer of this.observers) {
      observer(topic, message);
    }

    const groups = this.groups.get(topic);
    if (groups) {
      for (const group of groups.keys()) {
        this.schedule(topic, group, partition);
      }
    }
    return ok(offset);
  }

  subscribe(topic: string, group: string, handler: MessageHandler): Subscription {
    const state = this.groupState(topic, group);
    const member: Member = { id: nanoid(8), handler };
    state.members.push(member);

    for (let p = 0; p < this.options.partitions; p++) {
      this.schedule(topic, group, p);
    }

    return {
      topic,
      group,
      unsubscribe: () => {
        const idx = state.members.indexOf(member);
        if (idx >= 0) state.members.splice(idx, 1);
      },
    };
  }

  /** Observes every published message; used for tracing and tests. */
  tap(observer: BusObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  deadLetters(): readonly DeadLetter[] {
    return this.dead;
  }

  /** Committed offset for a group/partition (the next offset it will receive). */
  committedOffset(topic: string, group: string, partition: number): number {
    return this.groups.get(topic)?.get(group)?.committed[partition] ?? 0;
  }

  // ── Delivery ────────────────────────────────────────

  private schedule(topic: string, group: string, partition: number): void {
    const state = this.groups.get(topic)?.get(group);
    if (!state || state.pumping[partition] || this.closed) return;

    state.pumping[partition] = true;
    const run = this.pump(topic, group, partition, state)
      .catch((e: unknown) => {
        this.log.error({ err: e, topic, group, partition }, "partition pump crashed");
      })
      .finally(() => {
        state.pumping[partition] = false;
        this.active.delete(run);
        // A publish may have landed between the pump's last read and now.
        if (state.members.length > 0 && this.hasPending(topic, state, partition)) {
          this.schedule(topic, group, partition);
        }
      });
    this.active.add(run);
  }

  private async pump(
    topic: string,
    group: string,
    partition: number,
    state: GroupState,
  ): Promise<void> {
    const log = this.partitionsOf(topic)[partition];
    if (!log) return;

    let attempt = 1;
    while (!this.closed) {
      const offset = state.committed[partition] ?? 0;
      const message = log.entries[offset - log.base];
      if (message === undefined) return;

      const member = state.members[partition % Math.max(state.members.length, 1)];
      if (!member) return;

      const envelope = AgentMessageSchema.safeParse(message);
      if (!envelope.success) {
        this.deadLetter(topic, group, partition, offset, message, envelope.error.message);
        this.commit(topic, state, partition, offset + 1);
        attempt = 1;
        continue;
      }

      try {
        await member.handler(structuredClone(message), {
          topic,
          group,
          partition,
          offset,
          attempt,
        });
        this.commit(topic, state, partition, offset + 1);
        attempt = 1;
      } catch (e) {
        const error = e instanceof Error ? e.message : String(e);
        if (attempt >= this.options.maxDeliveries) {
          this.deadLetter(topic, group, partition, offset, message, error);
          this.commit(topic, state, partition, offset + 1);
          attempt = 1;
          continue;
        }
        this.log.warn(
          { topic, group, partition, offset, attempt, error },
          "handler failed, redelivering",
        );
        attempt++;
        await sleep(this.options.redeliveryDelayMs);
      }
    }
  }

  private hasPending(topic: string, state: GroupState, partition: number): boolean {
    const log = this.partitionsOf(topic)[partition];
    if (!log) return false;
    return (state.committed[partition] ?? 0) < log.base + log.entries.length;
  }

  private commit(
    topic: string,
    state: GroupState,
    partition: number,
    next: number,
  ): void {
    state.committed[partition] = next;
    this.trim(topic, partition);
    this.queueOffsets();
  }

  private deadLetter(
    topic: string,
    group: string,
    partition: number,
    offset: number,
    message: AgentMessage,
    error: string,
  ): void {
    this.log.error(
      { topic, group, partition, offset, messageType: message.messageType, error },
      "message dead-lettered",
    );
    this.dead.push({ topic, group, partition, offset, message, error });
  }

  /** Drops entries every group of the topic has already committed. */
  private trim(topic: string, partition: number): void {
    const log = this.partitionsOf(topic)[partition];
    const groups = this.groups.get(topic);
    if (!log || !groups || groups.size === 0) return;

    let low = Infinity;
    for (const state of groups.values()) {
      low = Math.min(low, state.committed[partition] ?? 0);
    }
    const drop = low - log.base;
    if (drop > 0) {
      log.entries.splice(0, drop);
      log.base = low;
    }
  }

  // ── State ───────────────────────────────────────────

  private partitionsOf(topic: string): PartitionLog[] {
    let logs = this.logs.get(topic);
    if (!logs) {
      logs = Array.from({ length: this.options.partitions }, () => ({
        base: 0,
        entries: [],
      }));
      this.logs.set(topic, logs);
    }
    return logs;
  }

  private groupState(topic: string, group: string): GroupState {
    let groups = this.groups.get(topic);
    if (!groups) {
      groups = new Map();
      this.groups.set(topic, groups);
    }
    let state = groups.get(group);
    if (!state) {
      const stored = this.storedOffsets.get(topic)?.get(group);
      const logs = this.partitionsOf(topic);
      state = {
        members: [],
        committed: logs.map((log, p) => Math.max(stored?.[p] ?? 0, log.base)),
        pumping: logs.map(() => false),
      };
      groups.set(group, state);
    }
    return state;
  }

  // ── Journal ─────────────────────────────────────────

  private journal(topic: string, record: JournalRecord): void {
    const dir = this.options.journalDir;
    if (!dir) return;
    const file = path.join(dir, `${topic}.jsonl`);
    this.io = this.io
      .then(() => fs.appendFile(file, JSON.stringify(record) + "\n", "utf-8"))
      .catch((e: unknown) => {
        this.log.error({ err: e, topic }, "journal append failed");
      });
  }

  private queueOffsets(): void {
    const dir = this.options.journalDir;
    if (!dir || this.offsetsQueued) return;
    this.offsetsQueued = true;
    this.io = this.io
      .then(async () => {
        this.offsetsQueued = false;
        const snapshot: Record<string, Record<string, number[]>> = {};
        for (const [topic, groups] of this.groups) {
          snapshot[topic] = {};
          for (const [group, state] of groups) {
            snapshot[topic][group] = [...state.committed];
          }
        }
        const file = path.join(dir, "offsets.json");
        const tmp = `${file}.tmp.${nanoid(8)}`;
        await fs.writeFile(tmp, JSON.stringify(snapshot), "utf-8");
        await fs.rename(tmp, file);
      })
      .catch((e: unknown) => {
        this.log.error({ err: e }, "offset commit write failed");
      });
  }

  private async loadOffsets(dir: string): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(path.join(dir, "offsets.json"), "utf-8");
    } catch (e) {
      if (typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT") {
        return;
      }
      throw e;
    }
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== "object" || parsed === null) return;
    for (const [topic, groups] of Object.entries(parsed)) {
      if (typeof groups !== "object" || groups === null) continue;
      const byGroup = new Map<string, number[]>();
      for (const [group, offsets] of Object.entries(groups)) {
        if (Array.isArray(offsets)) {
          byGroup.set(
            group,
            offsets.map((o) => (typeof o === "number" ? o : 0)),
          );
        }
      }
      this.storedOffsets.set(topic, byGroup);
    }
  }

  private parseRecord(line: string): JournalRecord | null {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return null;
    }
    if (
      typeof raw !== "object" ||
      raw === null ||
      !("partition" in raw) ||
      !("offset" in raw) ||
      !("message" in raw) ||
      typeof raw.partition !== "number" ||
      typeof raw.offset !== "number"
    ) {
      return null;
    }
    const message = AgentMessageSchema.safeParse(raw.message);
    if (!message.success) return null;
    return {
      partition: raw.partition,
      offset: raw.offset,
      message: { ...message.data, payload: message.data.payload },
    };
  }
}
