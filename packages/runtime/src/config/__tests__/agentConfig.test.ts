import { describe, expect, it } from "vitest";
import { AgentError } from "../../errors/index.js";
import { DEFAULT_AGENT_CONFIG, loadAgentConfig } from "../agentConfig.js";

describe("loadAgentConfig", () => {
  it("falls back to the defaults", () => {
    expect(loadAgentConfig({}, {})).toEqual(DEFAULT_AGENT_CONFIG);
  });

  it("reads AGENT_* environment variables", () => {
    const config = loadAgentConfig(
      {},
      {
        AGENT_ID: "env-agent",
        AGENT_MAX_CONCURRENT_SYSTEMS: "0",
        AGENT_SYSTEM_TIMEOUT_MS: "1500",
        AGENT_DRAIN_TIMEOUT_MS: "250",
        AGENT_LOG_LEVEL: "warn",
        AGENT_MAX_EXECUTION_HISTORY: "",
        UNRELATED: "ignored",
      }
    );

    expect(config).toEqual({
      agentId: "env-agent",
      maxExecutionHistory: 1_000,
      maxConcurrentSystems: null,
      defaultSystemTimeoutMs: 1_500,
      drainTimeoutMs: 250,
      logLevel: "warn",
    });
  });

  it("lets explicit options win over the environment", () => {
    const config = loadAgentConfig(
      { agentId: "explicit", maxConcurrentSystems: 4 },
      { AGENT_ID: "env-agent", AGENT_MAX_CONCURRENT_SYSTEMS: "2" }
    );

    expect(config.agentId).toBe("explicit");
    expect(config.maxConcurrentSystems).toBe(4);
  });

  it("rejects invalid values with a BUILD_ERROR", () => {
    const error = (() => {
      try {
        return loadAgentConfig({ maxExecutionHistory: 0 }, {});
      } catch (reason) {
        return reason;
      }
    })();
    expect(error).toBeInstanceOf(AgentError);
    expect(error).toMatchObject({ code: "BUILD_ERROR" });
    expect(() => loadAgentConfig({ maxExecutionHistory: 0 }, {})).toThrow(
      "Invalid agent configuration: maxExecutionHistory: Number must be greater than 0"
    );
    expect(() => loadAgentConfig({}, { AGENT_LOG_LEVEL: "loud" })).toThrow(
      /^Invalid agent configuration: AGENT_LOG_LEVEL: /
    );
  });
});
