import { z } from "zod";
import { AgentError } from "../errors/index.js";
import { LogLevelSchema } from "../logging/logger.js";

export const AgentLoopConfigSchema = z
  .object({
    /** 代理实例标识，用于日志作用域与上下文快照 */
    agentId: z.string().min(1),
    /** 系统执行历史的保留条数，超出后按最早优先淘汰 */
    maxExecutionHistory: z.number().int().positive(),
    /** 同时运行的系统调用上限，null 表示不限制 */
    maxConcurrentSystems: z.number().int().positive().nullable(),
    /** 系统未声明超时时间时使用的默认值（毫秒），null 表示不设超时 */
    defaultSystemTimeoutMs: z.number().int().positive().nullable(),
    /** 停机排空阶段等待在途系统调用的最长时间（毫秒） */
    drainTimeoutMs: z.number().int().nonnegative(),
    logLevel: LogLevelSchema,
  })
  .strict();

export type AgentLoopConfig = z.infer<typeof AgentLoopConfigSchema>;

export type AgentLoopConfigInput = Partial<AgentLoopConfig>;

export const DEFAULT_AGENT_CONFIG: AgentLoopConfig = {
  agentId: "agent",
  maxExecutionHistory: 1_000,
  maxConcurrentSystems: null,
  defaultSystemTimeoutMs: null,
  drainTimeoutMs: 5_000,
  logLevel: "info",
};

const optionalNumber = z.coerce.number().int().optional();

const EnvSchema = z.object({
  AGENT_ID: z.string().min(1).optional(),
  AGENT_MAX_EXECUTION_HISTORY: optionalNumber,
  AGENT_MAX_CONCURRENT_SYSTEMS: optionalNumber,
  AGENT_SYSTEM_TIMEOUT_MS: optionalNumber,
  AGENT_DRAIN_TIMEOUT_MS: optionalNumber,
  AGENT_LOG_LEVEL: LogLevelSchema.optional(),
});

type Env = Record<string, string | undefined>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function firstDefined<T>(...candidates: Array<T | undefined>): T | undefined {
  return candidates.find((candidate) => candidate !== undefined);
}

function readEnv(env: Env): AgentLoopConfigInput {
  // 空字符串视为未设置
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) => key.startsWith("AGENT_") && value !== undefined && value !== ""
    )
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw AgentError.invalidConfig(formatIssues(parsed.error));
  }
  const vars = parsed.data;
  return {
    agentId: vars.AGENT_ID,
    maxExecutionHistory: vars.AGENT_MAX_EXECUTION_HISTORY,
    // 0 in the environment means "no limit"
    maxConcurrentSystems:
      vars.AGENT_MAX_CONCURRENT_SYSTEMS === 0 ? null : vars.AGENT_MAX_CONCURRENT_SYSTEMS,
    defaultSystemTimeoutMs:
      vars.AGENT_SYSTEM_TIMEOUT_MS === 0 ? null : vars.AGENT_SYSTEM_TIMEOUT_MS,
    drainTimeoutMs: vars.AGENT_DRAIN_TIMEOUT_MS,
    logLevel: vars.AGENT_LOG_LEVEL,
  };
}

/**
 * Resolves the loop configuration: explicit overrides win over `AGENT_*`
 * environment variables, which win over the defaults.
 */
export function loadAgentConfig(
  overrides: AgentLoopConfigInput = {},
  env: Env = process.env
): AgentLoopConfig {
  const fromEnv = readEnv(env);
  const candidate = {
    agentId: firstDefined(overrides.agentId, fromEnv.agentId, DEFAULT_AGENT_CONFIG.agentId),
    maxExecutionHistory: firstDefined(
      overrides.maxExecutionHistory,
      fromEnv.maxExecutionHistory,
      DEFAULT_AGENT_CONFIG.maxExecutionHistory
    ),
    maxConcurrentSystems: firstDefined(
      overrides.maxConcurrentSystems,
      fromEnv.maxConcurrentSystems,
      DEFAULT_AGENT_CONFIG.maxConcurrentSystems
    ),
    defaultSystemTimeoutMs: firstDefined(
      overrides.defaultSystemTimeoutMs,
      fromEnv.defaultSystemTimeoutMs,
      DEFAULT_AGENT_CONFIG.defaultSystemTimeoutMs
    ),
    drainTimeoutMs: firstDefined(
      overrides.drainTimeoutMs,
      fromEnv.drainTimeoutMs,
      DEFAULT_AGENT_CONFIG.drainTimeoutMs
    ),
    logLevel: firstDefined(overrides.logLevel, fromEnv.logLevel, DEFAULT_AGENT_CONFIG.logLevel),
  };
  const parsed = AgentLoopConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw AgentError.invalidConfig(formatIssues(parsed.error));
  }
  return parsed.data;
}
