import { Observable, type Subscriber } from "rxjs";
import {
  createAgentEvent,
  type AgentEvent,
  type CreateAgentEventOptions,
  type EventSource,
} from "../types/sources.js";

export type ResponseListener = (event: AgentEvent, response: string) => void | Promise<void>;

export interface QueueEventSourceOptions {
  onResponse?: ResponseListener;
}

/**
 * Push-based source. Events pushed before the loop subscribes are buffered;
 * the queue can be consumed by one loop only.
 */
export class QueueEventSource implements EventSource {
  private readonly buffer: AgentEvent[] = [];

  private subscriber: Subscriber<AgentEvent> | null = null;

  private consumed = false;

  private closed = false;

  /** Set once the consumer unsubscribes; nothing can read the queue after that. */
  private released = false;

  private failure: { error: unknown } | null = null;

  private readonly listener: ResponseListener | undefined;

  constructor(public readonly name: string, options: QueueEventSourceOptions = {}) {
    this.listener = options.onResponse;
  }

  public events(): Observable<AgentEvent> {
    return new Observable<AgentEvent>((subscriber) => {
      if (this.consumed) {
        subscriber.error(new Error(`Queue ${this.name} is already being consumed`));
        return undefined;
      }
      this.consumed = true;
      this.subscriber = subscriber;
      for (const event of this.buffer.splice(0)) {
        subscriber.next(event);
      }
      this.settle();
      return () => {
        this.subscriber = null;
        this.released = true;
      };
    });
  }

  public onResponse(event: AgentEvent, response: string): void | Promise<void> {
    return this.listener?.(event, response);
  }

  /** Builds an event from this source and queues it. */
  public push(name: string, options: CreateAgentEventOptions = {}): AgentEvent {
    const event = createAgentEvent(name, this.name, options);
    this.pushEvent(event);
    return event;
  }

  public pushEvent(event: AgentEvent): void {
    if (this.closed || this.failure || this.released) {
      throw new Error(`Queue ${this.name} no longer accepts events`);
    }
    if (this.subscriber) {
      this.subscriber.next(event);
    } else {
      this.buffer.push(event);
    }
  }

  /** Completes the source once buffered events have been delivered. */
  public close(): void {
    this.closed = true;
    this.settle();
  }

  /** Errors the source, which fails the loop consuming it. */
  public fail(error: unknown): void {
    this.failure = { error };
    this.settle();
  }

  private settle(): void {
    if (!this.subscriber) {
      return;
    }
    if (this.failure) {
      this.subscriber.error(this.failure.error);
    } else if (this.closed) {
      this.subscriber.complete();
    }
  }
}
