import type { AgentContext } from "../core/AgentContext.js";
import type { SystemHandle } from "../core/SystemHandle.js";
import type { EntityId } from "../event/EntityId.js";
import type { SystemType } from "../registry/SystemType.js";
import type { AggregatedResponse, AnyBusEvent, BusEvent } from "./events.js";
import type { AgentEvent } from "./sources.js";
import type { ExecuteOptions, SystemStatus } from "./systems.js";

export interface ExecuteSystemAction {
  kind: "execute_system";
  system: SystemType<unknown, unknown>;
  input: unknown;
  priority: number;
  /** 为 true 时，循环等待该调用结束后才处理下一个动作 */
  wait: boolean;
  /** 调用成功后把输出写入上下文的键名；设置后隐含 wait */
  storeAs: string | null;
}

export interface SendEventAction {
  kind: "send_event";
  event: AnyBusEvent;
}

export interface UpdateContextAction {
  kind: "update_context";
  key: string;
  value: unknown;
}

export type AgentAction = ExecuteSystemAction | SendEventAction | UpdateContextAction;

export type AgentActionKind = AgentAction["kind"];

export interface StrategyResult {
  /** 回传给事件来源的文本响应 */
  response?: string;
  /** 按顺序执行的动作列表 */
  actions: AgentAction[];
  /** false 时循环在本事件处理完后停止 */
  shouldContinue: boolean;
}

/**
 * Capabilities a strategy may use while `process` is running. The loop
 * revokes them once `process` returns, so they cannot be kept for later.
 */
export interface StrategyTools {
  execute<I, O>(type: SystemType<I, O>, input: I, options?: ExecuteOptions): SystemHandle<O>;
  send<P, R>(event: BusEvent<P, R>): Promise<AggregatedResponse<R>>;
  status(executionId: number): SystemStatus | undefined;
  createEntity(): EntityId;
}

export interface Strategy {
  readonly name: string;
  /**
   * Decides how to react to one event. Throw a `StrategyError` to report a
   * failure; anything else thrown counts as recoverable.
   */
  process(event: AgentEvent, context: AgentContext, tools: StrategyTools): Promise<StrategyResult>;
}
