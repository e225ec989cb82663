import type { EntityId } from "../event/EntityId.js";
import type {
  BroadcastEventType,
  EventType,
  TargetedEventType,
} from "../event/EventType.js";
import { AgentError, EventError } from "../errors/index.js";
import type {
  BusEvent,
  HandlerEntry,
  HandlerKind,
  SuspendingHandler,
  SyncHandler,
} from "../types/events.js";

/**
 * Type-indexed handler storage. Broadcast types accept any number of
 * handlers, kept in registration order; targeted types accept one handler per
 * entity.
 */
export class HandlerRegistry {
  private nextOrder = 0;

  private sealed = false;

  private readonly types = new Set<EventType<unknown, unknown>>();

  public register<P, R>(
    type: BroadcastEventType<P, R>,
    handler: SyncHandler<P, R>
  ): HandlerEntry<P, R> {
    return this.add(type, "sync", handler, null);
  }

  public registerSuspending<P, R>(
    type: BroadcastEventType<P, R>,
    handler: SuspendingHandler<P, R>
  ): HandlerEntry<P, R> {
    return this.add(type, "suspending", handler, null);
  }

  public bind<P, R>(
    entity: EntityId,
    type: TargetedEventType<P, R>,
    handler: SyncHandler<P, R>
  ): HandlerEntry<P, R> {
    return this.add(type, "sync", handler, entity);
  }

  public bindSuspending<P, R>(
    entity: EntityId,
    type: TargetedEventType<P, R>,
    handler: SuspendingHandler<P, R>
  ): HandlerEntry<P, R> {
    return this.add(type, "suspending", handler, entity);
  }

  /** Broadcast handlers for `type`, in registration order. */
  public handlersFor<P, R>(type: EventType<P, R>): readonly HandlerEntry<P, R>[] {
    return type.peekHandlers(this);
  }

  public boundHandler<P, R>(
    type: EventType<P, R>,
    entity: EntityId
  ): HandlerEntry<P, R> | undefined {
    return type
      .peekHandlers(this)
      .find((entry) => entry.entity !== null && entry.entity.equals(entity));
  }

  public count(type: EventType<unknown, unknown>): number {
    return type.peekHandlers(this).length;
  }

  /** Names of every event type that has at least one handler. */
  public eventNames(): string[] {
    return Array.from(this.types, (type) => type.name);
  }

  public get isSealed(): boolean {
    return this.sealed;
  }

  public seal(): void {
    this.sealed = true;
  }

  public unseal(): void {
    this.sealed = false;
  }

  private add<P, R>(
    type: EventType<P, R>,
    kind: HandlerKind,
    handler: (payload: P, event: BusEvent<P, R>) => R | Promise<R>,
    entity: EntityId | null
  ): HandlerEntry<P, R> {
    if (this.sealed) {
      throw AgentError.alreadyRunning(`register a handler for ${type.name}`);
    }
    if (entity === null && type.kind === "targeted") {
      throw EventError.invalidBinding(type.name, "targeted events must be bound to an entity");
    }
    if (entity !== null && type.kind === "broadcast") {
      throw EventError.invalidBinding(type.name, "broadcast events cannot be bound to an entity");
    }
    if (entity !== null && this.boundHandler(type, entity)) {
      throw EventError.duplicateBinding(type.name, entity);
    }

    const entry: HandlerEntry<P, R> = {
      kind,
      order: this.nextOrder,
      entity,
      lastInvokedAt: null,
      invoke: handler,
    };
    this.nextOrder += 1;
    type.handlerSlot(this).push(entry);
    this.types.add(type);
    return entry;
  }
}
