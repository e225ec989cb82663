import { describe, expect, it } from "vitest";
import { z } from "zod";
import { AgentContext } from "../AgentContext.js";

describe("AgentContext", () => {
  it("stores, reads and deletes values", () => {
    const context = new AgentContext({ agentId: "ctx", initialValues: { mood: "calm" } });

    context.set("count", 1);
    context.patch({ count: 2, topic: "weather" });

    expect(context.get("count")).toBe(2);
    expect(context.has("topic")).toBe(true);
    expect(context.delete("topic")).toBe(true);
    expect(context.delete("topic")).toBe(false);
    expect(context.entries()).toEqual([
      ["mood", "calm"],
      ["count", 2],
    ]);
  });

  it("validates typed reads", () => {
    const context = new AgentContext({ agentId: "ctx" });
    context.set("limit", 5);
    context.set("name", 5);

    expect(context.read("limit", z.number())).toBe(5);
    expect(context.read("name", z.string())).toBeUndefined();
    expect(context.read("missing", z.string())).toBeUndefined();
  });

  it("returns snapshots detached from the live state", () => {
    const context = new AgentContext({ agentId: "ctx", metadata: { owner: "tests" } });
    context.set("list", [1, 2]);
    context.beginIteration("evt-1");

    const snapshot = context.getSnapshot();
    const list = snapshot.values.list;
    if (Array.isArray(list)) {
      list.push(3);
    }

    expect(snapshot).toMatchObject({
      agentId: "ctx",
      iteration: 1,
      lastEventId: "evt-1",
      metadata: { owner: "tests" },
    });
    expect(context.get("list")).toEqual([1, 2]);
  });
});
