import type { z } from "zod";

export interface AgentContextSnapshot {
  agentId: string;
  /** 已开始处理的事件数量 */
  iteration: number;
  /** 最近一次开始处理的事件 ID */
  lastEventId: string | null;
  values: Record<string, unknown>;
  metadata: Record<string, unknown>;
}

export interface AgentContextOptions {
  agentId: string;
  initialValues?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

/**
 * Key/value state owned by the agent loop and handed to the strategy for each
 * event. Only the loop advances `iteration`.
 */
export class AgentContext {
  private snapshot: AgentContextSnapshot;

  constructor(options: AgentContextOptions) {
    this.snapshot = {
      agentId: options.agentId,
      iteration: 0,
      lastEventId: null,
      values: options.initialValues ? { ...options.initialValues } : {},
      metadata: options.metadata ? { ...options.metadata } : {},
    };
  }

  public get agentId(): string {
    return this.snapshot.agentId;
  }

  public get iteration(): number {
    return this.snapshot.iteration;
  }

  public get lastEventId(): string | null {
    return this.snapshot.lastEventId;
  }

  public get(key: string): unknown {
    return this.snapshot.values[key];
  }

  /** 读取并用 zod schema 校验某个键，缺失或不匹配时返回 undefined */
  public read<T>(key: string, schema: z.ZodType<T>): T | undefined {
    const parsed = schema.safeParse(this.snapshot.values[key]);
    return parsed.success ? parsed.data : undefined;
  }

  public has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.snapshot.values, key);
  }

  public set(key: string, value: unknown): void {
    this.snapshot = {
      ...this.snapshot,
      values: { ...this.snapshot.values, [key]: value },
    };
  }

  public delete(key: string): boolean {
    if (!this.has(key)) {
      return false;
    }
    const { [key]: _removed, ...rest } = this.snapshot.values;
    this.snapshot = { ...this.snapshot, values: rest };
    return true;
  }

  public entries(): Array<[string, unknown]> {
    return Object.entries(this.snapshot.values);
  }

  // 合并多个键值，保持已有键
  public patch(values: Record<string, unknown>): void {
    this.snapshot = {
      ...this.snapshot,
      values: { ...this.snapshot.values, ...values },
    };
  }

  public mergeMetadata(metadata: Record<string, unknown>): void {
    this.snapshot = {
      ...this.snapshot,
      metadata: { ...this.snapshot.metadata, ...metadata },
    };
  }

  /** @internal called by the loop before each event reaches the strategy */
  public beginIteration(eventId: string): void {
    this.snapshot = {
      ...this.snapshot,
      iteration: this.snapshot.iteration + 1,
      lastEventId: eventId,
    };
  }

  // 返回当前上下文的深拷贝，避免外部直接修改内部状态
  public getSnapshot(): AgentContextSnapshot {
    return structuredClone(this.snapshot);
  }
}
