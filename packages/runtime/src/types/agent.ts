import type { Observable } from "rxjs";
import type { AgentError, StrategyError } from "../errors/index.js";
import type { DispatchRecord } from "./events.js";
import type { AgentEvent, EventSource, OnFinish } from "./sources.js";
import type { SystemStatusChange } from "./systems.js";

export type LifecycleState = "idle" | "running" | "draining" | "stopped" | "failed";

export type StopReason =
  /** 策略返回 shouldContinue=false */
  | "strategy"
  /** 收到 terminate 指令 */
  | "instruction"
  /** 外部调用 shutdown() */
  | "shutdown"
  /** 所有事件源均已结束 */
  | "sources_exhausted"
  /** 策略抛出致命错误 */
  | "fatal";

export interface AgentMetrics {
  eventsReceived: number;
  eventsProcessed: number;
  eventsExpired: number;
  /** 未通过 AgentEvent 校验而被丢弃的事件 */
  eventsRejected: number;
  systemsExecuted: number;
  systemSuccesses: number;
  systemFailures: number;
  eventsSent: number;
  eventDispatchFailures: number;
  recoverableErrors: number;
}

export type AgentRunResult =
  | {
      state: "stopped";
      reason: StopReason;
      /** 仅在 reason 为 fatal 时存在 */
      error?: StrategyError;
      metrics: AgentMetrics;
    }
  | {
      state: "failed";
      error: AgentError;
      metrics: AgentMetrics;
    };

export interface EventSourceRegistration {
  source: EventSource;
  onFinish: OnFinish;
}

export interface AgentResponse {
  event: AgentEvent;
  response: string;
}

export interface AgentStreams {
  state$: Observable<LifecycleState>;
  responses$: Observable<AgentResponse>;
  dispatches$: Observable<DispatchRecord>;
  systemStatus$: Observable<SystemStatusChange>;
}
