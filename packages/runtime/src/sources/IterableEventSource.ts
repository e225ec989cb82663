import { from, type Observable } from "rxjs";
import type { AgentEvent, EventSource } from "../types/sources.js";
import type { ResponseListener } from "./QueueEventSource.js";

/** Replays a fixed list, or drains an async iterable, as the loop's input. */
export class IterableEventSource implements EventSource {
  constructor(
    public readonly name: string,
    private readonly items: Iterable<AgentEvent> | AsyncIterable<AgentEvent>,
    private readonly listener?: ResponseListener
  ) {}

  public events(): Observable<AgentEvent> {
    return from(this.items);
  }

  public onResponse(event: AgentEvent, response: string): void | Promise<void> {
    return this.listener?.(event, response);
  }
}
