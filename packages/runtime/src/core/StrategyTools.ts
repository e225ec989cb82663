import { StrategyError } from "../errors/index.js";
import type { EntityId } from "../event/EntityId.js";
import type { EventBus } from "../event/EventBus.js";
import type { SystemRegistry } from "../registry/SystemRegistry.js";
import type { SystemType } from "../registry/SystemType.js";
import type { AggregatedResponse, BusEvent } from "../types/events.js";
import type { StrategyTools } from "../types/strategy.js";
import type { ExecuteOptions, SystemStatus } from "../types/systems.js";
import type { ExecutionTracker } from "./ExecutionTracker.js";
import type { SystemHandle } from "./SystemHandle.js";

export interface SendObserver {
  onSent(): void;
  onSendFailed(error: unknown): void;
}

export interface ScopedStrategyToolsDeps {
  bus: EventBus;
  systems: SystemRegistry;
  tracker: ExecutionTracker;
  observer: SendObserver;
}

/** Per-event capabilities; unusable once {@link revoke} has been called. */
export class ScopedStrategyTools implements StrategyTools {
  private revoked = false;

  constructor(private readonly deps: ScopedStrategyToolsDeps) {}

  public execute<I, O>(
    type: SystemType<I, O>,
    input: I,
    options: ExecuteOptions = {}
  ): SystemHandle<O> {
    this.assertActive("execute");
    return this.deps.tracker.track(this.deps.systems.execute(type, input, options));
  }

  public async send<P, R>(event: BusEvent<P, R>): Promise<AggregatedResponse<R>> {
    this.assertActive("send");
    this.deps.observer.onSent();
    try {
      return await this.deps.bus.send(event);
    } catch (error) {
      this.deps.observer.onSendFailed(error);
      throw error;
    }
  }

  public status(executionId: number): SystemStatus | undefined {
    return this.deps.systems.getExecutionStatus(executionId);
  }

  public createEntity(): EntityId {
    this.assertActive("createEntity");
    return this.deps.bus.createEntity();
  }

  public revoke(): void {
    this.revoked = true;
  }

  private assertActive(operation: string): void {
    if (this.revoked) {
      throw StrategyError.recoverable(
        `StrategyTools.${operation} was called after process() returned`
      );
    }
  }
}
