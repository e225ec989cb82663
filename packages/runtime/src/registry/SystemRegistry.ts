import { EventEmitter } from "eventemitter3";
import { Observable } from "rxjs";
import { SystemHandle, type ExecutionControl } from "../core/SystemHandle.js";
import { AgentError, SystemError, describeError } from "../errors/index.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type {
  ExecuteOptions,
  SystemAdapter,
  SystemContext,
  SystemInvocation,
  SystemMetrics,
  SystemSettlement,
  SystemStatus,
  SystemStatusChange,
} from "../types/systems.js";
import { Deferred, withTimeout } from "../utils/deferred.js";
import type { SystemType } from "./SystemType.js";

export interface SystemRegistryOptions {
  /** 执行历史保留条数，默认 1000 */
  maxHistory?: number;
  /** 同时运行的系统调用上限，null 表示不限制 */
  maxConcurrent?: number | null;
  /** 系统未声明 timeoutMs 时使用的默认超时 */
  defaultTimeoutMs?: number | null;
  logger?: Logger;
}

interface SystemRegistryEvents {
  status: [change: SystemStatusChange];
}

interface ExecutionRecord {
  context: SystemContext;
  cancelled: boolean;
  /** 以失败结果提前结束 handle（取消时使用） */
  abandon(error: SystemError, status: SystemStatus): void;
}

interface QueuedInvocation {
  record: ExecutionRecord;
  start(): void;
}

interface MutableMetrics {
  executions: number;
  successes: number;
  failures: number;
  timeouts: number;
  cancellations: number;
  totalDurationMs: number;
  completedRuns: number;
  lastExecutedAt: number | null;
}

type Outcome<O> = { ok: true; value: O } | { ok: false; error: SystemError };

const DEFAULT_MAX_HISTORY = 1_000;

/**
 * Registry and executor for systems. `execute` never blocks the caller: it
 * records a pending invocation, returns a handle, and starts the body on a
 * later microtask.
 */
export class SystemRegistry implements ExecutionControl {
  private readonly emitter = new EventEmitter<SystemRegistryEvents>();

  private readonly descriptions = new Map<string, string>();

  private readonly history = new Map<number, ExecutionRecord>();

  private readonly active = new Map<number, ExecutionRecord>();

  private readonly queue: QueuedInvocation[] = [];

  private readonly metrics = new Map<string, MutableMetrics>();

  private readonly maxHistory: number;

  private readonly maxConcurrent: number | null;

  private readonly defaultTimeoutMs: number | null;

  private readonly logger: Logger;

  private nextExecutionId = 1;

  private running = 0;

  private pumpScheduled = false;

  private sealed = false;

  constructor(options: SystemRegistryOptions = {}) {
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.maxConcurrent = options.maxConcurrent ?? null;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  /** Binds `system` to its type token, replacing any earlier binding. */
  public registerSystem<I, O>(system: SystemAdapter<I, O>): void {
    if (this.sealed) {
      throw AgentError.alreadyRunning(`register system ${system.type.name}`);
    }
    const previous = system.type.bindAdapter(this, system);
    if (previous) {
      this.logger.info(`Replacing system ${system.type.name}`);
    }
    this.descriptions.set(system.type.name, system.description);
    this.metricsFor(system.type.name);
  }

  public has<I, O>(type: SystemType<I, O>): boolean {
    return type.adapterFor(this) !== undefined;
  }

  public list(): Array<{ name: string; description: string }> {
    return Array.from(this.descriptions, ([name, description]) => ({ name, description }));
  }

  public execute<I, O>(
    type: SystemType<I, O>,
    input: I,
    options: ExecuteOptions = {}
  ): SystemHandle<O> {
    const system = type.adapterFor(this);
    if (!system) {
      throw SystemError.notRegistered(type.name);
    }

    const deferred = new Deferred<SystemSettlement<O>>();
    const record: ExecutionRecord = {
      context: {
        executionId: this.nextExecutionId,
        systemName: type.name,
        priority: options.priority ?? 0,
        createdAt: Date.now(),
        startedAt: null,
        finishedAt: null,
        status: { state: "pending" },
      },
      cancelled: false,
      abandon: (error, status) => {
        deferred.resolve({ ok: false, error, status });
      },
    };
    this.nextExecutionId += 1;

    const metrics = this.metricsFor(type.name);
    metrics.executions += 1;
    metrics.lastExecutedAt = record.context.createdAt;

    this.active.set(record.context.executionId, record);
    this.remember(record);
    this.emitStatus(record.context, null);

    this.queue.push({
      record,
      start: () => {
        void this.runBody(system, input, record, deferred);
      },
    });
    this.schedulePump();

    return new SystemHandle<O>({
      executionId: record.context.executionId,
      systemName: type.name,
      settlement: deferred.promise,
      control: this,
    });
  }

  /**
   * Marks a pending or running invocation as `failed("cancelled")`. The body
   * is not stopped; whatever it returns later is discarded.
   */
  public cancel(executionId: number): boolean {
    const record = this.active.get(executionId);
    if (!record) {
      return false;
    }
    const status: SystemStatus = { state: "failed", reason: "cancelled" };
    record.cancelled = true;
    // a queued body never starts, but observers still see it pass through running
    if (record.context.status.state === "pending") {
      record.context.startedAt = Date.now();
      this.transition(record.context, { state: "running" });
    }
    record.context.finishedAt = Date.now();
    this.transition(record.context, status);
    this.active.delete(executionId);

    const metrics = this.metricsFor(record.context.systemName);
    metrics.failures += 1;
    metrics.cancellations += 1;

    record.abandon(
      SystemError.executionFailed(record.context.systemName, executionId, "cancelled"),
      status
    );
    return true;
  }

  public getExecutionStatus(executionId: number): SystemStatus | undefined {
    return this.history.get(executionId)?.context.status;
  }

  /** Point-in-time copy of an invocation's context. */
  public getExecution(executionId: number): SystemContext | undefined {
    const record = this.history.get(executionId);
    return record ? { ...record.context } : undefined;
  }

  public requireExecution(executionId: number): SystemContext {
    const context = this.getExecution(executionId);
    if (!context) {
      throw SystemError.unknownExecution(executionId);
    }
    return context;
  }

  public getSystemMetrics(): Record<string, SystemMetrics> {
    const snapshot: Record<string, SystemMetrics> = {};
    for (const [systemName, metrics] of this.metrics) {
      snapshot[systemName] = {
        systemName,
        executions: metrics.executions,
        successes: metrics.successes,
        failures: metrics.failures,
        timeouts: metrics.timeouts,
        cancellations: metrics.cancellations,
        totalDurationMs: metrics.totalDurationMs,
        averageDurationMs:
          metrics.completedRuns === 0 ? 0 : metrics.totalDurationMs / metrics.completedRuns,
        lastExecutedAt: metrics.lastExecutedAt,
      };
    }
    return snapshot;
  }

  /** Execution ids that are still pending or running. */
  public inFlight(): number[] {
    return Array.from(this.active.keys());
  }

  /** Drops every finished invocation from the history. */
  public clearHistory(): void {
    for (const [executionId, record] of this.history) {
      if (!this.active.has(executionId)) {
        this.history.delete(executionId);
      }
    }
  }

  public statusChanges(): Observable<SystemStatusChange> {
    return new Observable<SystemStatusChange>((subscriber) => {
      const handler = (change: SystemStatusChange) => subscriber.next(change);
      this.emitter.on("status", handler);
      return () => {
        this.emitter.off("status", handler);
      };
    });
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

  private async runBody<I, O>(
    system: SystemAdapter<I, O>,
    input: I,
    record: ExecutionRecord,
    deferred: Deferred<SystemSettlement<O>>
  ): Promise<void> {
    const { context } = record;
    context.startedAt = Date.now();
    this.transition(context, { state: "running" });

    const timeoutMs = system.timeoutMs ?? this.defaultTimeoutMs;
    const invocation: SystemInvocation = {
      executionId: context.executionId,
      systemName: context.systemName,
      priority: context.priority,
      isCancelled: () => record.cancelled,
    };

    // the slot is held until the body settles, even after a timeout has fired
    const body = Promise.resolve().then(() => system.run(input, invocation));
    const release = () => {
      this.running -= 1;
      this.schedulePump();
    };
    void body.then(release, release);

    let outcome: Outcome<O>;
    try {
      const value = await withTimeout(
        body,
        timeoutMs,
        () => SystemError.timeout(context.systemName, context.executionId, timeoutMs ?? 0)
      );
      outcome = { ok: true, value };
    } catch (error) {
      outcome = {
        ok: false,
        error:
          error instanceof SystemError
            ? error
            : SystemError.executionFailed(
                context.systemName,
                context.executionId,
                describeError(error),
                error
              ),
      };
    }

    if (record.cancelled) {
      this.logger.debug(`Discarding result of cancelled execution ${context.executionId}`);
      return;
    }
    deferred.resolve(this.finish(record, outcome));
  }

  private finish<O>(record: ExecutionRecord, outcome: Outcome<O>): SystemSettlement<O> {
    const { context } = record;
    context.finishedAt = Date.now();
    const metrics = this.metricsFor(context.systemName);
    this.active.delete(context.executionId);

    if (outcome.ok) {
      const durationMs = context.finishedAt - (context.startedAt ?? context.createdAt);
      const status: SystemStatus = { state: "completed", durationMs };
      this.transition(context, status);
      metrics.successes += 1;
      metrics.completedRuns += 1;
      metrics.totalDurationMs += durationMs;
      return { ok: true, value: outcome.value, status };
    }

    const status: SystemStatus = { state: "failed", reason: outcome.error.message };
    this.transition(context, status);
    metrics.failures += 1;
    if (outcome.error.code === "TIMEOUT") {
      metrics.timeouts += 1;
    }
    this.logger.warn(`System ${context.systemName} failed`, {
      executionId: context.executionId,
      reason: outcome.error.message,
    });
    return { ok: false, error: outcome.error, status };
  }

  private schedulePump(): void {
    if (this.pumpScheduled) {
      return;
    }
    this.pumpScheduled = true;
    queueMicrotask(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (
      this.queue.length > 0 &&
      (this.maxConcurrent === null || this.running < this.maxConcurrent)
    ) {
      const next = this.takeNext();
      if (!next || next.record.cancelled) {
        continue;
      }
      this.running += 1;
      next.start();
    }
  }

  // 优先级高者先执行，同优先级按执行编号先后
  private takeNext(): QueuedInvocation | undefined {
    let bestIndex = 0;
    this.queue.forEach((candidate, index) => {
      const best = this.queue[bestIndex];
      if (!best) {
        return;
      }
      const a = candidate.record.context;
      const b = best.record.context;
      if (a.priority > b.priority || (a.priority === b.priority && a.executionId < b.executionId)) {
        bestIndex = index;
      }
    });
    return this.queue.splice(bestIndex, 1)[0];
  }

  private remember(record: ExecutionRecord): void {
    this.history.set(record.context.executionId, record);
    if (this.history.size <= this.maxHistory) {
      return;
    }
    // oldest finished entries go first; in-flight ones are never evicted
    for (const executionId of this.history.keys()) {
      if (this.history.size <= this.maxHistory) {
        break;
      }
      if (!this.active.has(executionId)) {
        this.history.delete(executionId);
      }
    }
  }

  private transition(context: SystemContext, status: SystemStatus): void {
    const previous = context.status;
    context.status = status;
    this.emitStatus(context, previous);
  }

  private emitStatus(context: SystemContext, previous: SystemStatus | null): void {
    this.emitter.emit("status", {
      executionId: context.executionId,
      systemName: context.systemName,
      previous,
      current: context.status,
      timestamp: Date.now(),
    });
  }

  private metricsFor(systemName: string): MutableMetrics {
    let metrics = this.metrics.get(systemName);
    if (!metrics) {
      metrics = {
        executions: 0,
        successes: 0,
        failures: 0,
        timeouts: 0,
        cancellations: 0,
        totalDurationMs: 0,
        completedRuns: 0,
        lastExecutedAt: null,
      };
      this.metrics.set(systemName, metrics);
    }
    return metrics;
  }
}
