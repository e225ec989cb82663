import {
  BehaviorSubject,
  EMPTY,
  Observable,
  Subject,
  catchError,
  concat,
  concatMap,
  defer,
  filter,
  from,
  map,
  merge,
  of,
  takeUntil,
  takeWhile,
  throwError,
} from "rxjs";
import { createActor, type Actor } from "xstate";
import { loadAgentConfig, type AgentLoopConfig, type AgentLoopConfigInput } from "../config/agentConfig.js";
import { AgentError, StrategyError, describeError } from "../errors/index.js";
import type { EntityId } from "../event/EntityId.js";
import { EventBus } from "../event/EventBus.js";
import type { BroadcastEventType, TargetedEventType } from "../event/EventType.js";
import {
  createLifecycleMachine,
  isLifecycleState,
  type LifecycleEvent,
  type LifecycleMachine,
} from "../fsm/lifecycleMachine.js";
import { createConsoleLogger, type Logger } from "../logging/logger.js";
import { SystemRegistry } from "../registry/SystemRegistry.js";
import type {
  AgentMetrics,
  AgentResponse,
  AgentRunResult,
  AgentStreams,
  EventSourceRegistration,
  LifecycleState,
  StopReason,
} from "../types/agent.js";
import type {
  HandlerEntry,
  Mediator,
  SuspendingHandler,
  SyncHandler,
} from "../types/events.js";
import {
  AgentEventSchema,
  isExpired,
  terminateEvent,
  type AddEventSourceOptions,
  type AgentEvent,
  type EventSource,
} from "../types/sources.js";
import type { AgentAction, Strategy, StrategyResult } from "../types/strategy.js";
import type { SystemAdapter, SystemStatus } from "../types/systems.js";
import { AgentContext } from "./AgentContext.js";
import { ExecutionTracker } from "./ExecutionTracker.js";
import { ScopedStrategyTools } from "./StrategyTools.js";

export interface AgentLoopOptions {
  config?: AgentLoopConfigInput;
  strategy: Strategy;
  eventBus?: EventBus;
  systems?: SystemRegistry;
  logger?: Logger;
  /** 初始上下文键值 */
  initialContext?: Record<string, unknown>;
  /** 读取 AGENT_* 配置的环境变量表，默认 process.env */
  env?: Record<string, string | undefined>;
}

interface Incoming {
  registration: EventSourceRegistration;
  event: unknown;
}

type StopStep = { kind: "stop"; reason: StopReason; error?: StrategyError };

type Step = { kind: "continue" } | StopStep;

type LoopOutcome = StopStep | { kind: "fail"; error: AgentError };

type LoopCounters = Omit<AgentMetrics, "systemsExecuted" | "systemSuccesses" | "systemFailures">;

const CONTINUE: Step = { kind: "continue" };

/**
 * Drives one agent: merges every event source into a single stream, hands
 * each event to the strategy, and applies the returned actions in order.
 * Events are processed one at a time, end to end.
 */
export class AgentLoop {
  public readonly config: AgentLoopConfig;

  public readonly context: AgentContext;

  private readonly strategy: Strategy;

  private readonly bus: EventBus;

  private readonly systems: SystemRegistry;

  private readonly logger: Logger;

  private readonly sources: EventSourceRegistration[] = [];

  private readonly tracker = new ExecutionTracker();

  private readonly actor: Actor<LifecycleMachine>;

  private readonly state$ = new BehaviorSubject<LifecycleState>("idle");

  private readonly responses$ = new Subject<AgentResponse>();

  private readonly shutdown$ = new BehaviorSubject<boolean>(false);

  private readonly counters: LoopCounters = {
    eventsReceived: 0,
    eventsProcessed: 0,
    eventsExpired: 0,
    eventsRejected: 0,
    eventsSent: 0,
    eventDispatchFailures: 0,
    recoverableErrors: 0,
  };

  private runPromise: Promise<AgentRunResult> | null = null;

  constructor(options: AgentLoopOptions) {
    this.config = loadAgentConfig(options.config ?? {}, options.env ?? process.env);
    this.logger =
      options.logger ?? createConsoleLogger(`AgentLoop:${this.config.agentId}`, this.config.logLevel);
    this.strategy = options.strategy;
    this.bus = options.eventBus ?? new EventBus({ logger: this.logger.child("EventBus") });
    this.systems =
      options.systems ??
      new SystemRegistry({
        maxHistory: this.config.maxExecutionHistory,
        maxConcurrent: this.config.maxConcurrentSystems,
        defaultTimeoutMs: this.config.defaultSystemTimeoutMs,
        logger: this.logger.child("Systems"),
      });
    this.context = new AgentContext({
      agentId: this.config.agentId,
      ...(options.initialContext ? { initialValues: options.initialContext } : {}),
    });

    this.actor = createActor(createLifecycleMachine(this.config.agentId));
    this.actor.subscribe((snapshot) => {
      const state = snapshot.value;
      if (isLifecycleState(state) && state !== this.state$.value) {
        this.logger.debug(`Lifecycle ${this.state$.value} -> ${state}`);
        this.state$.next(state);
      }
    });
    this.actor.start();
  }

  public get eventBus(): EventBus {
    return this.bus;
  }

  public get systemRegistry(): SystemRegistry {
    return this.systems;
  }

  public get streams(): AgentStreams {
    return {
      state$: this.state$.asObservable(),
      responses$: this.responses$.asObservable(),
      dispatches$: this.bus.dispatches(),
      systemStatus$: this.systems.statusChanges(),
    };
  }

  public registerHandler<P, R>(
    type: BroadcastEventType<P, R>,
    handler: SyncHandler<P, R>
  ): HandlerEntry<P, R> {
    this.assertIdle(`register a handler for ${type.name}`);
    return this.bus.register(type, handler);
  }

  public registerSuspendingHandler<P, R>(
    type: BroadcastEventType<P, R>,
    handler: SuspendingHandler<P, R>
  ): HandlerEntry<P, R> {
    this.assertIdle(`register a handler for ${type.name}`);
    return this.bus.registerSuspending(type, handler);
  }

  public registerMediator<P, R>(
    type: BroadcastEventType<P, R>,
    mediator: Mediator<P, R>
  ): HandlerEntry<P, R> {
    this.assertIdle(`register a mediator for ${type.name}`);
    return this.bus.registerMediator(type, mediator);
  }

  public bindHandler<P, R>(
    entity: EntityId,
    type: TargetedEventType<P, R>,
    handler: SyncHandler<P, R>
  ): HandlerEntry<P, R> {
    this.assertIdle(`bind a handler for ${type.name}`);
    return this.bus.bind(entity, type, handler);
  }

  public bindSuspendingHandler<P, R>(
    entity: EntityId,
    type: TargetedEventType<P, R>,
    handler: SuspendingHandler<P, R>
  ): HandlerEntry<P, R> {
    this.assertIdle(`bind a handler for ${type.name}`);
    return this.bus.bindSuspending(entity, type, handler);
  }

  public registerSystem<I, O>(system: SystemAdapter<I, O>): void {
    this.assertIdle(`register system ${system.type.name}`);
    this.systems.registerSystem(system);
  }

  public addEventSource(source: EventSource, options: AddEventSourceOptions = {}): void {
    this.assertIdle(`add event source ${source.name}`);
    this.sources.push({ source, onFinish: options.onFinish ?? "continue" });
  }

  public createEntity(): EntityId {
    return this.bus.createEntity();
  }

  /**
   * Starts the loop and resolves once it reaches `stopped` or `failed`.
   * The promise only rejects for a second call.
   */
  public run(): Promise<AgentRunResult> {
    const state = this.getState();
    if (this.runPromise !== null || state !== "idle") {
      return Promise.reject(AgentError.notIdle("run", state === "idle" ? "running" : state));
    }
    this.runPromise = this.execute();
    return this.runPromise;
  }

  /**
   * Asks the loop to stop after the event in progress. Safe to call any
   * number of times; from `idle` it stops the agent without running it.
   */
  public async shutdown(): Promise<void> {
    if (!this.shutdown$.value) {
      this.shutdown$.next(true);
      if (this.getState() === "idle") {
        this.transition({ type: "DRAIN", reason: "shutdown" });
        this.completeStreams();
      } else {
        this.logger.info("Shutdown requested");
      }
    }
    if (this.runPromise) {
      await this.runPromise;
    }
  }

  public getState(): LifecycleState {
    return this.state$.value;
  }

  public getMetrics(): AgentMetrics {
    const systems = this.tracker.snapshot();
    return {
      ...this.counters,
      systemsExecuted: systems.started,
      systemSuccesses: systems.succeeded,
      systemFailures: systems.failed,
    };
  }

  public getSystemStatus(executionId: number): SystemStatus | undefined {
    return this.systems.getExecutionStatus(executionId);
  }

  private async execute(): Promise<AgentRunResult> {
    this.bus.registry.seal();
    this.systems.seal();
    this.transition({ type: "START" });
    this.logger.info(`Agent started with strategy ${this.strategy.name}`, {
      sources: this.sources.map(({ source }) => source.name),
    });

    const outcome = await this.consume();
    if (outcome.kind === "fail") {
      this.logger.error(outcome.error.message);
      this.transition({ type: "FAIL", error: outcome.error });
      return this.finish({ state: "failed", error: outcome.error, metrics: this.getMetrics() });
    }

    this.transition({ type: "DRAIN", reason: outcome.reason, error: outcome.error });
    const unfinished = await this.tracker.drain(this.config.drainTimeoutMs);
    if (unfinished.length > 0) {
      this.logger.warn(`Stopped with ${unfinished.length} system executions still running`, {
        executionIds: unfinished,
      });
    }
    this.transition({ type: "DRAINED" });
    this.logger.info(`Agent stopped (${outcome.reason})`);

    return this.finish(
      outcome.error
        ? { state: "stopped", reason: outcome.reason, error: outcome.error, metrics: this.getMetrics() }
        : { state: "stopped", reason: outcome.reason, metrics: this.getMetrics() }
    );
  }

  private consume(): Promise<LoopOutcome> {
    return new Promise<LoopOutcome>((resolve) => {
      let stop: StopStep | null = null;
      merge(...this.sources.map((registration) => this.sourceStream(registration)))
        .pipe(
          takeUntil(this.shutdown$.pipe(filter(Boolean))),
          // 逐个事件串行处理，处理完一个再取下一个
          concatMap((incoming) => this.handleIncoming(incoming)),
          takeWhile((step) => step.kind === "continue", true)
        )
        .subscribe({
          next: (step) => {
            if (step.kind === "stop") {
              stop = step;
            }
          },
          error: (error: unknown) => resolve({ kind: "fail", error: AgentError.from(error) }),
          complete: () =>
            resolve(
              stop ?? {
                kind: "stop",
                reason: this.shutdown$.value ? "shutdown" : "sources_exhausted",
              }
            ),
        });
    });
  }

  private sourceStream(registration: EventSourceRegistration): Observable<Incoming> {
    const { source, onFinish } = registration;
    const events$ = defer(() => from(source.events()));
    // a source that finishes with "stop" asks the loop to terminate
    const tail$ = onFinish === "stop" ? defer(() => of(terminateEvent(source.name))) : EMPTY;
    return concat(events$, tail$).pipe(
      map((event): Incoming => ({ registration, event })),
      catchError((error: unknown) =>
        throwError(() => AgentError.sourceFailure(source.name, error))
      )
    );
  }

  private async handleIncoming({ registration, event: raw }: Incoming): Promise<Step> {
    if (this.shutdown$.value) {
      return CONTINUE;
    }
    this.counters.eventsReceived += 1;

    const parsed = AgentEventSchema.safeParse(raw);
    if (!parsed.success) {
      this.counters.eventsRejected += 1;
      this.logger.warn(`Rejected malformed event from ${registration.source.name}`, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return CONTINUE;
    }
    const event = parsed.data;

    if (isExpired(event)) {
      this.counters.eventsExpired += 1;
      this.logger.debug(`Dropped expired event ${event.name}`, { eventId: event.eventId });
      return CONTINUE;
    }
    if (event.instruction === "terminate") {
      this.logger.info(`Terminate instruction from ${event.source}`);
      return { kind: "stop", reason: "instruction" };
    }

    this.context.beginIteration(event.eventId);
    const tools = new ScopedStrategyTools({
      bus: this.bus,
      systems: this.systems,
      tracker: this.tracker,
      observer: {
        onSent: () => {
          this.counters.eventsSent += 1;
        },
        onSendFailed: () => {
          this.counters.eventDispatchFailures += 1;
        },
      },
    });

    let result: StrategyResult;
    try {
      result = await this.strategy.process(event, this.context, tools);
    } catch (error) {
      this.counters.eventsProcessed += 1;
      const failure = StrategyError.from(error);
      if (failure.severity === "fatal") {
        this.logger.error(`Strategy ${this.strategy.name} failed fatally: ${failure.message}`, {
          eventId: event.eventId,
        });
        return { kind: "stop", reason: "fatal", error: failure };
      }
      this.counters.recoverableErrors += 1;
      this.logger.warn(`Strategy ${this.strategy.name} failed: ${failure.message}`, {
        eventId: event.eventId,
      });
      return CONTINUE;
    } finally {
      tools.revoke();
    }

    this.counters.eventsProcessed += 1;
    await this.applyActions(event, result.actions);
    if (result.response !== undefined) {
      await this.deliverResponse(registration.source, event, result.response);
    }
    return result.shouldContinue ? CONTINUE : { kind: "stop", reason: "strategy" };
  }

  private async applyActions(event: AgentEvent, actions: AgentAction[]): Promise<void> {
    for (const action of actions) {
      try {
        await this.applyAction(action);
      } catch (error) {
        this.logger.warn(`Action ${action.kind} failed`, {
          eventId: event.eventId,
          error: describeError(error),
        });
      }
    }
  }

  private async applyAction(action: AgentAction): Promise<void> {
    switch (action.kind) {
      case "execute_system": {
        const handle = this.tracker.track(
          this.systems.execute(action.system, action.input, { priority: action.priority })
        );
        if (!action.wait) {
          return;
        }
        const output = await handle.wait();
        if (action.storeAs !== null) {
          this.context.set(action.storeAs, output);
        }
        return;
      }
      case "send_event": {
        this.counters.eventsSent += 1;
        try {
          await this.bus.send(action.event);
        } catch (error) {
          this.counters.eventDispatchFailures += 1;
          throw error;
        }
        return;
      }
      case "update_context":
        this.context.set(action.key, action.value);
        return;
      default: {
        const unreachable: never = action;
        throw new Error(`Unknown action ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async deliverResponse(source: EventSource, event: AgentEvent, response: string): Promise<void> {
    this.responses$.next({ event, response });
    if (!source.onResponse) {
      return;
    }
    try {
      await source.onResponse(event, response);
    } catch (error) {
      this.logger.warn(`Source ${source.name} rejected a response`, {
        eventId: event.eventId,
        error: describeError(error),
      });
    }
  }

  private finish(result: AgentRunResult): AgentRunResult {
    this.completeStreams();
    return result;
  }

  private completeStreams(): void {
    this.responses$.complete();
    this.state$.complete();
  }

  private transition(event: LifecycleEvent): void {
    // 终态 actor 不再接收事件
    if (this.actor.getSnapshot().status === "active") {
      this.actor.send(event);
    }
  }

  private assertIdle(operation: string): void {
    const state = this.getState();
    if (state !== "idle") {
      throw state === "running" || state === "draining"
        ? AgentError.alreadyRunning(operation)
        : AgentError.notIdle(operation, state);
    }
  }
}
