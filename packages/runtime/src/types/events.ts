import type { EntityId } from "../event/EntityId.js";
import type { EventType } from "../event/EventType.js";

export type EventKind = "broadcast" | "targeted";

/** 处理器能力标记：同步执行或可挂起（返回 Promise） */
export type HandlerKind = "sync" | "suspending";

export interface BusEvent<P, R> {
  /** 事件实例唯一标识 */
  readonly eventId: string;
  /** 事件类型令牌，决定载荷与响应类型 */
  readonly type: EventType<P, R>;
  /** 事件载荷 */
  readonly payload: P;
  /** 事件创建时间戳（毫秒） */
  readonly timestamp: number;
  /** 链路追踪 ID，用于串联同一次流程 */
  readonly traceId: string;
  /** 定向事件的目标实体；广播事件为 null */
  readonly target: EntityId | null;
}

export type AnyBusEvent = BusEvent<unknown, unknown>;

export type SyncHandler<P, R> = (payload: P, event: BusEvent<P, R>) => R;

export type SuspendingHandler<P, R> = (payload: P, event: BusEvent<P, R>) => Promise<R>;

export interface HandlerEntry<P, R> {
  readonly kind: HandlerKind;
  /** 全局注册序号，广播分发按此顺序执行 */
  readonly order: number;
  /** 定向处理器绑定的实体；广播处理器为 null */
  readonly entity: EntityId | null;
  /** 最近一次被调用的时间戳，仅用于内部记录 */
  lastInvokedAt: number | null;
  invoke(payload: P, event: BusEvent<P, R>): R | Promise<R>;
}

export interface AggregatedResponse<R> {
  eventName: string;
  /** 实际投递到的处理器数量 */
  delivered: number;
  /** 按注册顺序排列的处理器返回值 */
  responses: R[];
}

export interface DispatchRecord {
  eventId: string;
  type: EventType<unknown, unknown>;
  eventName: string;
  kind: EventKind;
  target: EntityId | null;
  delivered: number;
  failed: number;
  durationMs: number;
  timestamp: number;
}

/** Lets a mediator emit follow-up events while handling one. */
export interface EventSender {
  send(event: AnyBusEvent): void;
}

export type Mediator<P, R> = (
  payload: P,
  sender: EventSender,
  event: BusEvent<P, R>
) => R | Promise<R>;
