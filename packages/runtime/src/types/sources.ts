import { nanoid } from "nanoid";
import type { Observable } from "rxjs";
import { z } from "zod";

export const AgentInstructionSchema = z.enum(["terminate"]);

export type AgentInstruction = z.infer<typeof AgentInstructionSchema>;

export const AgentEventSchema = z
  .object({
    eventId: z.string().min(1),
    /** 事件名称，例如 "user.message" */
    name: z.string().min(1),
    /** 产生该事件的来源名称，响应会回传给它 */
    source: z.string().min(1),
    content: z.unknown().optional(),
    /** 控制指令；携带 terminate 的事件不会交给策略处理 */
    instruction: AgentInstructionSchema.optional(),
    /** 过期时间戳（毫秒），过期事件被丢弃 */
    expiresAt: z.number().int().nonnegative().optional(),
    timestamp: z.number().int().nonnegative(),
    traceId: z.string().min(1).optional(),
  })
  .strict();

export type AgentEvent = z.infer<typeof AgentEventSchema>;

export interface CreateAgentEventOptions {
  content?: unknown;
  /** 相对创建时间的存活时长 */
  lifetimeMs?: number;
  instruction?: AgentInstruction;
  traceId?: string;
}

export function createAgentEvent(
  name: string,
  source: string,
  options: CreateAgentEventOptions = {}
): AgentEvent {
  const timestamp = Date.now();
  const event: AgentEvent = { eventId: nanoid(), name, source, timestamp };
  if (options.content !== undefined) {
    event.content = options.content;
  }
  if (options.lifetimeMs !== undefined) {
    event.expiresAt = timestamp + options.lifetimeMs;
  }
  if (options.instruction !== undefined) {
    event.instruction = options.instruction;
  }
  if (options.traceId !== undefined) {
    event.traceId = options.traceId;
  }
  return event;
}

/** An event that asks the loop to stop once everything before it is handled. */
export function terminateEvent(source: string): AgentEvent {
  return createAgentEvent("terminate", source, { instruction: "terminate" });
}

export function isExpired(event: AgentEvent, now: number = Date.now()): boolean {
  return event.expiresAt !== undefined && event.expiresAt < now;
}

export interface EventSource {
  readonly name: string;
  /** Called once when the loop starts. */
  events(): Observable<AgentEvent> | AsyncIterable<AgentEvent>;
  /** Receives the strategy's response to an event this source produced. */
  onResponse?(event: AgentEvent, response: string): void | Promise<void>;
}

/** What happens when a source completes: keep running, or stop the loop. */
export type OnFinish = "continue" | "stop";

export interface AddEventSourceOptions {
  onFinish?: OnFinish;
}
