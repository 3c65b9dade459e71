import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import type { AgentMessage } from "@intentflow/shared";
import { MessageBus, partitionFor } from "../../../src/bus/message-bus.js";
import { createMessage } from "../../../src/bus/envelope.js";

function message(correlationId: string, n: number): AgentMessage {
  return createMessage({
    senderId: "test",
    receiverId: "test",
    messageType: "FEEDBACK",
    payload: { n },
    correlationId,
  });
}

function publishAll(bus: MessageBus, topic: string, messages: AgentMessage[]): string[] {
  for (const m of messages) {
    const published = bus.publish(topic, m);
    if (published.isErr()) throw published.error;
  }
  return messages.map((m) => m.id);
}

describe("MessageBus", () => {
  let bus: MessageBus;

  beforeEach(() => {
    bus = new MessageBus({ partitions: 4, redeliveryDelayMs: 1, maxDeliveries: 3 });
  });

  afterEach(async () => {
    await bus.close();
  });

  it("should map a key to the same partition every time", () => {
    expect(partitionFor("task-1", 8)).toBe(partitionFor("task-1", 8));
    for (const key of ["a", "b", "task-42", ""]) {
      const p = partitionFor(key, 8);
      expect(p).toBeGreaterThanOrEqual(0);
      expect(p).toBeLessThan(8);
    }
  });

  it("should deliver one key's messages in publish order despite slow handlers", async () => {
    const seen: string[] = [];
    bus.subscribe("t", "g", async (m) => {
      await new Promise((r) => setTimeout(r, seen.length % 2 === 0 ? 5 : 0));
      seen.push(m.id);
    });

    const ids = publishAll(bus, "t", [0, 1, 2, 3, 4].map((n) => message("task-1", n)));
    await bus.drain();

    expect(seen).toEqual(ids);
  });

  it("should deliver messages published before anyone subscribed", async () => {
    const ids = publishAll(bus, "t", [message("task-1", 0), message("task-1", 1)]);
    const seen: string[] = [];
    bus.subscribe("t", "g", (m) => {
      seen.push(m.id);
    });
    await bus.drain();

    expect(seen).toEqual(ids);
  });

  it("should redeliver a message whose handler throws", async () => {
    const attempts: number[] = [];
    bus.subscribe("t", "g", (_m, delivery) => {
      attempts.push(delivery.attempt);
      if (delivery.attempt === 1) throw new Error("transient");
    });

    publishAll(bus, "t", [message("task-1", 0)]);
    await bus.drain();

    expect(attempts).toEqual([1, 2]);
    expect(bus.deadLetters()).toEqual([]);
    expect(bus.committedOffset("t", "g", partitionFor("task-1", 4))).toBe(1);
  });

  it("should dead-letter after the last delivery and move on", async () => {
    const seen: number[] = [];
    bus.subscribe("t", "g", (m, delivery) => {
      if (delivery.offset === 0) throw new Error("poison");
      seen.push(delivery.offset);
      expect(m.correlationId).toBe("task-1");
    });

    publishAll(bus, "t", [message("task-1", 0), message("task-1", 1)]);
    await bus.drain();

    expect(bus.deadLetters().map((d) => [d.offset, d.error])).toEqual([[0, "poison"]]);
    expect(seen).toEqual([1]);
  });

  it("should give every consumer group its own copy", async () => {
    const a: string[] = [];
    const b: string[] = [];
    bus.subscribe("t", "group-a", (m) => {
      a.push(m.id);
    });
    bus.subscribe("t", "group-b", (m) => {
      b.push(m.id);
    });

    const ids = publishAll(bus, "t", [message("task-1", 0), message("task-2", 1)]);
    await bus.drain();

    expect([...a].sort()).toEqual([...ids].sort());
    expect([...b].sort()).toEqual([...ids].sort());
  });

  it("should refuse to publish once closed", async () => {
    await bus.close();
    const published = bus.publish("t", message("task-1", 0));
    expect(published.isErr() && published.error.code).toBe("CLOSED");
  });

  describe("journal", () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "bus-test-"));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it("should resume a group from its committed offset after a restart", async () => {
      const options = { partitions: 2, redeliveryDelayMs: 1, maxDeliveries: 3, journalDir: tmpDir };

      const first = new MessageBus(options);
      expect((await first.open()).isOk()).toBe(true);
      const consumed: string[] = [];
      first.subscribe("t", "g", (m) => {
        consumed.push(m.id);
      });
      const ids = publishAll(first, "t", [message("task-1", 0), message("task-1", 1)]);
      await first.drain();
      await first.close();
      expect(consumed).toEqual(ids);

      const second = new MessageBus(options);
      expect((await second.open()).isOk()).toBe(true);
      const again: string[] = [];
      const fresh: string[] = [];
      second.subscribe("t", "g", (m) => {
        again.push(m.id);
      });
      second.subscribe("t", "late", (m) => {
        fresh.push(m.id);
      });
      await second.drain();
      await second.close();

      expect(again).toEqual([]);
      expect(fresh).toEqual(ids);
    });
  });
});
