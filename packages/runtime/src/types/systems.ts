import type { SystemError } from "../errors/index.js";
import type { SystemType } from "../registry/SystemType.js";

export type SystemStatus =
  | { state: "pending" }
  | { state: "running" }
  | { state: "completed"; durationMs: number }
  | { state: "failed"; reason: string };

export type SystemState = SystemStatus["state"];

export interface SystemContext {
  /** 单调递增、永不复用的执行编号 */
  executionId: number;
  systemName: string;
  priority: number;
  /** 调用创建（进入 pending）的时间戳 */
  createdAt: number;
  /** 进入 running 的时间戳，尚未开始时为 null */
  startedAt: number | null;
  /** 进入终态的时间戳 */
  finishedAt: number | null;
  status: SystemStatus;
}

export interface SystemInvocation {
  executionId: number;
  systemName: string;
  priority: number;
  /**
   * True once the invocation was cancelled. Bodies are never interrupted;
   * long-running ones may poll this and stop early.
   */
  isCancelled(): boolean;
}

export interface SystemAdapter<I, O> {
  /** 系统类型令牌，决定输入输出类型 */
  readonly type: SystemType<I, O>;
  /** 系统作用的简短说明 */
  readonly description: string;
  /** 可选：单次调用超时（毫秒），覆盖全局默认值 */
  readonly timeoutMs?: number;
  run(input: I, invocation: SystemInvocation): Promise<O>;
}

export interface ExecuteOptions {
  /** 排队时优先级越高越先开始执行，默认 0 */
  priority?: number;
}

export interface SystemMetrics {
  systemName: string;
  executions: number;
  successes: number;
  failures: number;
  timeouts: number;
  cancellations: number;
  totalDurationMs: number;
  averageDurationMs: number;
  lastExecutedAt: number | null;
}

export interface SystemStatusChange {
  executionId: number;
  systemName: string;
  previous: SystemStatus | null;
  current: SystemStatus;
  timestamp: number;
}

export type SystemSettlement<O> =
  | { ok: true; value: O; status: SystemStatus }
  | { ok: false; error: SystemError; status: SystemStatus };
