import { lastValueFrom, toArray } from "rxjs";
import { describe, expect, it } from "vitest";
import { IntervalEventSource } from "../IntervalEventSource.js";
import { IterableEventSource } from "../IterableEventSource.js";
import { QueueEventSource } from "../QueueEventSource.js";
import { createAgentEvent, isExpired, type AgentEvent } from "../../types/sources.js";

describe("QueueEventSource", () => {
  it("buffers events pushed before subscription and completes on close", async () => {
    const queue = new QueueEventSource("inbox");
    queue.push("first", { content: 1 });
    queue.push("second");
    queue.close();

    const events = await lastValueFrom(queue.events().pipe(toArray()));

    expect(events.map((event) => [event.name, event.source, event.content])).toEqual([
      ["first", "inbox", 1],
      ["second", "inbox", undefined],
    ]);
  });

  it("allows a single consumer", async () => {
    const queue = new QueueEventSource("inbox");
    queue.events().subscribe();

    await expect(lastValueFrom(queue.events())).rejects.toThrow(
      "Queue inbox is already being consumed"
    );
  });

  it("refuses events after close", () => {
    const queue = new QueueEventSource("inbox");
    queue.close();

    expect(() => queue.push("late")).toThrow("Queue inbox no longer accepts events");
  });

  it("refuses events once its consumer unsubscribes", () => {
    const queue = new QueueEventSource("inbox");
    const seen: string[] = [];
    const subscription = queue.events().subscribe((event) => seen.push(event.name));
    queue.push("early");
    subscription.unsubscribe();

    expect(() => queue.push("late")).toThrow("Queue inbox no longer accepts events");
    expect(seen).toEqual(["early"]);
  });

  it("forwards responses to its listener", async () => {
    const replies: string[] = [];
    const queue = new QueueEventSource("inbox", {
      onResponse: (event, response) => {
        replies.push(`${event.name}=${response}`);
      },
    });

    await queue.onResponse(createAgentEvent("ask", "inbox"), "answer");

    expect(replies).toEqual(["ask=answer"]);
  });
});

describe("IterableEventSource", () => {
  it("drains async iterables", async () => {
    async function* generate(): AsyncGenerator<AgentEvent> {
      yield createAgentEvent("a", "gen");
      yield createAgentEvent("b", "gen");
    }
    const source = new IterableEventSource("gen", generate());

    const events = await lastValueFrom(source.events().pipe(toArray()));

    expect(events.map((event) => event.name)).toEqual(["a", "b"]);
  });
});

describe("IntervalEventSource", () => {
  it("emits numbered ticks up to count", async () => {
    const source = new IntervalEventSource({ periodMs: 1, count: 3 });

    const events = await lastValueFrom(source.events().pipe(toArray()));

    expect(events.map((event) => event.content)).toEqual([{ tick: 1 }, { tick: 2 }, { tick: 3 }]);
    expect(events.every((event) => event.name === "tick" && event.source === "interval")).toBe(true);
  });
});

describe("createAgentEvent", () => {
  it("derives expiresAt from lifetimeMs", () => {
    const event = createAgentEvent("ping", "test", { lifetimeMs: 100 });

    expect(event.expiresAt).toBe(event.timestamp + 100);
    expect(isExpired(event, event.timestamp + 100)).toBe(false);
    expect(isExpired(event, event.timestamp + 101)).toBe(true);
    expect(isExpired(createAgentEvent("ping", "test"))).toBe(false);
  });
});
