import { describe, expect, it } from "vitest";
import { AgentError } from "../../errors/index.js";
import { EntityId } from "../../event/EntityId.js";
import { defineEvent, defineTargetedEvent } from "../../event/EventType.js";
import { HandlerRegistry } from "../HandlerRegistry.js";

const Tick = defineEvent<number, number>("tick");
const Reset = defineEvent<void>("reset");
const Move = defineTargetedEvent<{ x: number }, boolean>("move");

describe("HandlerRegistry", () => {
  it("keeps broadcast entries in registration order", () => {
    const registry = new HandlerRegistry();
    const first = registry.register(Tick, (n) => n + 1);
    const second = registry.registerSuspending(Tick, async (n) => n * 2);

    const entries = registry.handlersFor(Tick);

    expect(entries).toEqual([first, second]);
    expect(entries.map((entry) => entry.kind)).toEqual(["sync", "suspending"]);
    expect(first.order).toBeLessThan(second.order);
    expect(registry.count(Tick)).toBe(2);
    expect(registry.count(Reset)).toBe(0);
  });

  it("stores handlers per registry", () => {
    const left = new HandlerRegistry();
    const right = new HandlerRegistry();
    left.register(Tick, (n) => n);

    expect(left.count(Tick)).toBe(1);
    expect(right.count(Tick)).toBe(0);
  });

  it("finds the handler bound to an entity", () => {
    const registry = new HandlerRegistry();
    const knight = EntityId.next();
    const bishop = EntityId.next();
    const entry = registry.bind(knight, Move, () => true);

    expect(registry.boundHandler(Move, knight)).toBe(entry);
    expect(registry.boundHandler(Move, bishop)).toBeUndefined();
    expect(entry.entity).toBe(knight);
  });

  it("lists event names that have handlers", () => {
    const registry = new HandlerRegistry();
    registry.register(Tick, (n) => n);
    registry.register(Reset, () => undefined);
    registry.register(Tick, (n) => n);

    expect(registry.eventNames()).toEqual(["tick", "reset"]);
  });

  it("keeps same-named event types apart", () => {
    const registry = new HandlerRegistry();
    const OtherTick = defineEvent<string>("tick");
    registry.register(Tick, (n) => n);

    expect(registry.count(OtherTick)).toBe(0);
    registry.register(OtherTick, () => undefined);
    expect(registry.eventNames()).toEqual(["tick", "tick"]);
    expect(registry.count(Tick)).toBe(1);
  });

  it("rejects registration while sealed", () => {
    const registry = new HandlerRegistry();
    registry.seal();

    let error: unknown;
    try {
      registry.register(Tick, (n) => n);
    } catch (reason) {
      error = reason;
    }
    expect(error).toBeInstanceOf(AgentError);
    expect(error).toMatchObject({ code: "BUILD_ERROR" });
    expect(() => registry.register(Tick, (n) => n)).toThrow(
      "Cannot register a handler for tick: the agent is already running"
    );

    registry.unseal();
    registry.register(Tick, (n) => n);
    expect(registry.count(Tick)).toBe(1);
  });
});

describe("EntityId", () => {
  it("hands out increasing ids that are never equal", () => {
    const a = EntityId.next();
    const b = EntityId.next();

    expect(b.value).toBe(a.value + 1);
    expect(a.equals(b)).toBe(false);
    expect(a.equals(a)).toBe(true);
    expect(a.toString()).toBe(`entity#${a.value}`);
  });
});
