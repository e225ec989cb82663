import { interval, map, take, type Observable } from "rxjs";
import { createAgentEvent, type AgentEvent, type EventSource } from "../types/sources.js";

export interface IntervalEventSourceOptions {
  name?: string;
  /** 事件名称，默认 "tick" */
  eventName?: string;
  periodMs: number;
  /** 产生的事件数量；缺省时无限产生 */
  count?: number;
  /** 每个事件的存活时长 */
  lifetimeMs?: number;
}

/** Emits `{ tick: n }` events on a timer, starting with tick 1. */
export class IntervalEventSource implements EventSource {
  public readonly name: string;

  private readonly eventName: string;

  constructor(private readonly options: IntervalEventSourceOptions) {
    this.name = options.name ?? "interval";
    this.eventName = options.eventName ?? "tick";
  }

  public events(): Observable<AgentEvent> {
    const ticks$ = interval(this.options.periodMs).pipe(
      map((index) =>
        createAgentEvent(this.eventName, this.name, {
          content: { tick: index + 1 },
          ...(this.options.lifetimeMs !== undefined ? { lifetimeMs: this.options.lifetimeMs } : {}),
        })
      )
    );
    return this.options.count === undefined ? ticks$ : ticks$.pipe(take(this.options.count));
  }
}
