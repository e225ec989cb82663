import { nanoid } from "nanoid";
import type { BusEvent, EventKind, HandlerEntry } from "../types/events.js";
import type { EntityId } from "./EntityId.js";

export interface CreateEventOptions {
  /** 可选：链路追踪 ID，缺省时自动生成 */
  traceId?: string;
}

/**
 * Identity token for one event type. The payload type `P` and response type
 * `R` are fixed when the token is declared; dispatch never looks at payload
 * contents to decide which handlers apply.
 *
 * Handler storage is keyed by the token: each token keeps a typed slot per
 * registry, so lookups stay statically typed.
 */
export abstract class EventType<P, R> {
  public abstract readonly kind: EventKind;

  private readonly slots = new WeakMap<object, HandlerEntry<P, R>[]>();

  protected constructor(public readonly name: string) {}

  /** @internal mutable handler list owned by `owner` */
  public handlerSlot(owner: object): HandlerEntry<P, R>[] {
    let slot = this.slots.get(owner);
    if (!slot) {
      slot = [];
      this.slots.set(owner, slot);
    }
    return slot;
  }

  /** @internal */
  public peekHandlers(owner: object): readonly HandlerEntry<P, R>[] {
    return this.slots.get(owner) ?? [];
  }

  protected build(
    payload: P,
    target: EntityId | null,
    options: CreateEventOptions
  ): BusEvent<P, R> {
    return Object.freeze({
      eventId: nanoid(),
      type: this,
      payload,
      timestamp: Date.now(),
      traceId: options.traceId ?? nanoid(),
      target,
    });
  }

  public toString(): string {
    return `${this.kind}:${this.name}`;
  }
}

export class BroadcastEventType<P, R = void> extends EventType<P, R> {
  public readonly kind = "broadcast" as const;

  constructor(name: string) {
    super(name);
  }

  public create(payload: P, options: CreateEventOptions = {}): BusEvent<P, R> {
    return this.build(payload, null, options);
  }
}

export class TargetedEventType<P, R = void> extends EventType<P, R> {
  public readonly kind = "targeted" as const;

  constructor(name: string) {
    super(name);
  }

  public to(target: EntityId, payload: P, options: CreateEventOptions = {}): BusEvent<P, R> {
    return this.build(payload, target, options);
  }
}

/** Declares an event delivered to every handler registered for it. */
export function defineEvent<P, R = void>(name: string): BroadcastEventType<P, R> {
  return new BroadcastEventType<P, R>(name);
}

/** Declares an event delivered only to the handler bound to its target entity. */
export function defineTargetedEvent<P, R = void>(name: string): TargetedEventType<P, R> {
  return new TargetedEventType<P, R>(name);
}
