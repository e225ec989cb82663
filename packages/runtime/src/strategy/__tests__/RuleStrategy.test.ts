import { describe, expect, it } from "vitest";
import { AgentContext } from "../../core/AgentContext.js";
import { StrategyError } from "../../errors/index.js";
import { createAgentEvent } from "../../types/sources.js";
import type { StrategyTools } from "../../types/strategy.js";
import { Echo } from "../../systems/EchoSystem.js";
import { Actions, continueWith, stopWith } from "../actions.js";
import { RuleStrategy } from "../RuleStrategy.js";

const unusedTools: StrategyTools = {
  execute: () => {
    throw new Error("not available in this test");
  },
  send: async () => {
    throw new Error("not available in this test");
  },
  status: () => undefined,
  createEntity: () => {
    throw new Error("not available in this test");
  },
};

const context = new AgentContext({ agentId: "rules" });

describe("RuleStrategy", () => {
  const strategy = new RuleStrategy({
    rules: {
      greet: (event) => continueWith([], `hello ${String(event.content)}`),
    },
    stopKeywords: ["quit", "exit"],
    stopResponse: "bye",
  });

  it("dispatches by event name", async () => {
    await expect(
      strategy.process(createAgentEvent("greet", "cli", { content: "ada" }), context, unusedTools)
    ).resolves.toEqual({ response: "hello ada", actions: [], shouldContinue: true });
  });

  it("stops on a stop keyword regardless of case and padding", async () => {
    await expect(
      strategy.process(createAgentEvent("greet", "cli", { content: "  EXIT " }), context, unusedTools)
    ).resolves.toEqual({ response: "bye", actions: [], shouldContinue: false });
  });

  it("raises a recoverable error without a matching rule", async () => {
    const error = await strategy
      .process(createAgentEvent("unknown", "cli"), context, unusedTools)
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(StrategyError);
    expect(error).toMatchObject({ code: "RECOVERABLE", message: "No rule for event unknown" });
  });

  it("uses the fallback when no rule matches", async () => {
    const withFallback = new RuleStrategy({ rules: {}, fallback: () => stopWith("done") });

    await expect(
      withFallback.process(createAgentEvent("other", "cli"), context, unusedTools)
    ).resolves.toEqual({ response: "done", actions: [], shouldContinue: false });
  });
});

describe("Actions", () => {
  it("implies waiting when an output is stored", () => {
    expect(Actions.executeSystem(Echo, "x", { storeAs: "out", wait: false })).toEqual({
      kind: "execute_system",
      system: Echo,
      input: "x",
      priority: 0,
      wait: true,
      storeAs: "out",
    });
    expect(Actions.executeSystem(Echo, "x", { priority: 3 })).toMatchObject({
      priority: 3,
      wait: false,
      storeAs: null,
    });
  });
});

describe("StrategyError", () => {
  it("classifies foreign errors as recoverable", () => {
    const wrapped = StrategyError.from(new Error("timeout talking to model"));

    expect(wrapped.severity).toBe("recoverable");
    expect(wrapped.message).toBe("timeout talking to model");
    expect(StrategyError.from(StrategyError.fatal("x")).severity).toBe("fatal");
  });
});
