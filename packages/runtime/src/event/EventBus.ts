import { EventEmitter } from "eventemitter3";
import { filter, Observable } from "rxjs";
import { EventError, describeError } from "../errors/index.js";
import type { HandlerFailure, HandlerSuccess } from "../errors/index.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { HandlerRegistry } from "../registry/HandlerRegistry.js";
import type {
  AggregatedResponse,
  AnyBusEvent,
  BusEvent,
  DispatchRecord,
  HandlerEntry,
  Mediator,
  SuspendingHandler,
  SyncHandler,
} from "../types/events.js";
import { EntityId } from "./EntityId.js";
import type { BroadcastEventType, EventType, TargetedEventType } from "./EventType.js";

interface BusEmitterEvents {
  dispatch: [record: DispatchRecord];
}

export interface EventBusOptions {
  registry?: HandlerRegistry;
  logger?: Logger;
}

export class EventBus {
  // 底层 EventEmitter 负责把分发记录推送给观察者。
  private readonly emitter = new EventEmitter<BusEmitterEvents>();

  public readonly registry: HandlerRegistry;

  private readonly logger: Logger;

  constructor(options: EventBusOptions = {}) {
    this.registry = options.registry ?? new HandlerRegistry();
    this.logger = options.logger ?? silentLogger;
  }

  public createEntity(): EntityId {
    return EntityId.next();
  }

  public register<P, R>(
    type: BroadcastEventType<P, R>,
    handler: SyncHandler<P, R>
  ): HandlerEntry<P, R> {
    return this.registry.register(type, handler);
  }

  public registerSuspending<P, R>(
    type: BroadcastEventType<P, R>,
    handler: SuspendingHandler<P, R>
  ): HandlerEntry<P, R> {
    return this.registry.registerSuspending(type, handler);
  }

  public bind<P, R>(
    entity: EntityId,
    type: TargetedEventType<P, R>,
    handler: SyncHandler<P, R>
  ): HandlerEntry<P, R> {
    return this.registry.bind(entity, type, handler);
  }

  public bindSuspending<P, R>(
    entity: EntityId,
    type: TargetedEventType<P, R>,
    handler: SuspendingHandler<P, R>
  ): HandlerEntry<P, R> {
    return this.registry.bindSuspending(entity, type, handler);
  }

  /**
   * Registers a handler that may emit further events. Events handed to the
   * sender are dispatched in emission order once the mediator returns; a
   * failure while dispatching them fails the mediator.
   */
  public registerMediator<P, R>(
    type: BroadcastEventType<P, R>,
    mediator: Mediator<P, R>
  ): HandlerEntry<P, R> {
    return this.registry.registerSuspending(type, async (payload, event) => {
      const outbox: AnyBusEvent[] = [];
      const response = await mediator(
        payload,
        { send: (next) => void outbox.push(next) },
        event
      );
      for (const next of outbox) {
        await this.send(next);
      }
      return response;
    });
  }

  /**
   * Delivers `event` and resolves once every handler involved has finished.
   *
   * Broadcast handlers run one after another in registration order; a failing
   * handler does not stop its siblings, and any failure rejects with
   * `PARTIAL_FAILURE`. Targeted events go to the single handler bound to the
   * target entity.
   */
  public async send<P, R>(event: BusEvent<P, R>): Promise<AggregatedResponse<R>> {
    if (event.type.kind === "targeted") {
      return this.sendTargeted(event);
    }

    const startedAt = Date.now();
    const entries = [...this.registry.handlersFor(event.type)];
    const responses: R[] = [];
    const succeeded: HandlerSuccess[] = [];
    const failed: HandlerFailure[] = [];

    for (const [index, entry] of entries.entries()) {
      try {
        const response = await this.invoke(entry, event);
        responses.push(response);
        succeeded.push({ index, order: entry.order, response });
      } catch (error) {
        this.logger.warn(`Handler #${entry.order} failed for ${event.type.name}`, {
          eventId: event.eventId,
          error: describeError(error),
        });
        failed.push({ index, order: entry.order, error });
      }
    }

    this.record(event, entries.length, failed.length, startedAt);
    if (failed.length > 0) {
      throw EventError.partialFailure(event.type.name, succeeded, failed);
    }
    return { eventName: event.type.name, delivered: entries.length, responses };
  }

  /**
   * Synchronous variant of {@link send}. Suspending handlers cannot complete
   * inside a synchronous call, so they are reported as failed instead of run.
   */
  public sendSync<P, R>(event: BusEvent<P, R>): AggregatedResponse<R> {
    const startedAt = Date.now();
    const targeted = event.type.kind === "targeted";
    const entries = targeted
      ? this.targetedEntries(event)
      : [...this.registry.handlersFor(event.type)];
    if (targeted && entries.length === 0) {
      this.record(event, 0, 0, startedAt);
      throw EventError.noHandler(event.type.name, event.target);
    }
    const responses: R[] = [];
    const succeeded: HandlerSuccess[] = [];
    const failed: HandlerFailure[] = [];

    for (const [index, entry] of entries.entries()) {
      if (entry.kind === "suspending") {
        failed.push({
          index,
          order: entry.order,
          error: new Error("suspending handler cannot run in a synchronous dispatch"),
        });
        continue;
      }
      try {
        entry.lastInvokedAt = Date.now();
        const response = entry.invoke(event.payload, event);
        if (response instanceof Promise) {
          throw new Error("synchronous handler returned a promise");
        }
        responses.push(response);
        succeeded.push({ index, order: entry.order, response });
      } catch (error) {
        failed.push({ index, order: entry.order, error });
      }
    }

    this.record(event, entries.length, failed.length, startedAt);
    if (targeted && event.target !== null) {
      const failure = failed[0];
      if (failure) {
        throw EventError.handlerFailed(event.type.name, event.target, failure.error);
      }
    } else if (failed.length > 0) {
      throw EventError.partialFailure(event.type.name, succeeded, failed);
    }
    return { eventName: event.type.name, delivered: entries.length, responses };
  }

  /**
   * 暴露一个冷 Observable，在订阅时挂接到 EventEmitter，
   * 并在取消订阅时自动移除此监听。
   */
  public dispatches(): Observable<DispatchRecord> {
    return new Observable<DispatchRecord>((subscriber) => {
      const handler = (record: DispatchRecord) => subscriber.next(record);
      this.emitter.on("dispatch", handler);
      return () => {
        this.emitter.off("dispatch", handler);
      };
    });
  }

  /**
   * 便捷方法：只订阅某个特定事件类型的分发记录。
   */
  public dispatchesOf(type: EventType<unknown, unknown>): Observable<DispatchRecord> {
    return this.dispatches().pipe(
      filter((record) => record.type === type)
    );
  }

  private async sendTargeted<P, R>(event: BusEvent<P, R>): Promise<AggregatedResponse<R>> {
    const startedAt = Date.now();
    const [entry] = this.targetedEntries(event);
    if (!entry || event.target === null) {
      this.record(event, 0, 0, startedAt);
      throw EventError.noHandler(event.type.name, event.target);
    }
    try {
      const response = await this.invoke(entry, event);
      this.record(event, 1, 0, startedAt);
      return { eventName: event.type.name, delivered: 1, responses: [response] };
    } catch (error) {
      this.record(event, 1, 1, startedAt);
      throw EventError.handlerFailed(event.type.name, event.target, error);
    }
  }

  private targetedEntries<P, R>(event: BusEvent<P, R>): HandlerEntry<P, R>[] {
    if (event.target === null) {
      return [];
    }
    const entry = this.registry.boundHandler(event.type, event.target);
    return entry ? [entry] : [];
  }

  private async invoke<P, R>(entry: HandlerEntry<P, R>, event: BusEvent<P, R>): Promise<R> {
    entry.lastInvokedAt = Date.now();
    return entry.invoke(event.payload, event);
  }

  private record<P, R>(
    event: BusEvent<P, R>,
    delivered: number,
    failed: number,
    startedAt: number
  ): void {
    this.emitter.emit("dispatch", {
      eventId: event.eventId,
      type: event.type,
      eventName: event.type.name,
      kind: event.type.kind,
      target: event.target,
      delivered,
      failed,
      durationMs: Date.now() - startedAt,
      timestamp: Date.now(),
    });
  }
}
