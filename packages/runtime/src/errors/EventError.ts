import type { EntityId } from "../event/EntityId.js";
import { AgentCoreError, describeError } from "./AgentCoreError.js";

export type EventErrorCode =
  | "NO_HANDLER"
  | "HANDLER_FAILED"
  | "PARTIAL_FAILURE"
  | "DUPLICATE_BINDING"
  | "INVALID_BINDING";

export interface HandlerSuccess {
  /** 在本次分发中的位置（按注册顺序） */
  index: number;
  /** 注册表中的全局注册序号 */
  order: number;
  response: unknown;
}

export interface HandlerFailure {
  index: number;
  order: number;
  error: unknown;
}

export class EventError extends AgentCoreError<EventErrorCode> {
  public readonly eventName: string;

  public readonly entity: EntityId | null;

  public readonly succeeded: readonly HandlerSuccess[];

  public readonly failed: readonly HandlerFailure[];

  private constructor(
    code: EventErrorCode,
    eventName: string,
    message: string,
    details: {
      entity?: EntityId | null;
      succeeded?: HandlerSuccess[];
      failed?: HandlerFailure[];
      cause?: unknown;
    } = {}
  ) {
    super(code, message, details.cause);
    this.eventName = eventName;
    this.entity = details.entity ?? null;
    this.succeeded = details.succeeded ?? [];
    this.failed = details.failed ?? [];
  }

  public static noHandler(eventName: string, entity: EntityId | null): EventError {
    const where = entity ? ` on ${entity.toString()}` : "";
    return new EventError("NO_HANDLER", eventName, `No handler bound for ${eventName}${where}`, {
      entity,
    });
  }

  public static handlerFailed(
    eventName: string,
    entity: EntityId,
    cause: unknown
  ): EventError {
    return new EventError(
      "HANDLER_FAILED",
      eventName,
      `Handler for ${eventName} on ${entity.toString()} failed: ${describeError(cause)}`,
      { entity, cause }
    );
  }

  public static partialFailure(
    eventName: string,
    succeeded: HandlerSuccess[],
    failed: HandlerFailure[]
  ): EventError {
    return new EventError(
      "PARTIAL_FAILURE",
      eventName,
      `${failed.length} of ${succeeded.length + failed.length} handlers failed for ${eventName}`,
      { succeeded, failed }
    );
  }

  public static duplicateBinding(eventName: string, entity: EntityId): EventError {
    return new EventError(
      "DUPLICATE_BINDING",
      eventName,
      `A handler for ${eventName} is already bound to ${entity.toString()}`,
      { entity }
    );
  }

  public static invalidBinding(eventName: string, reason: string): EventError {
    return new EventError(
      "INVALID_BINDING",
      eventName,
      `Cannot register handler for ${eventName}: ${reason}`
    );
  }
}
