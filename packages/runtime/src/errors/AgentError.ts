import { AgentCoreError, describeError } from "./AgentCoreError.js";

export type AgentErrorCode = "SOURCE_FAILURE" | "BUILD_ERROR";

export class AgentError extends AgentCoreError<AgentErrorCode> {
  private constructor(code: AgentErrorCode, message: string, cause?: unknown) {
    super(code, message, cause);
  }

  public static sourceFailure(sourceName: string, cause: unknown): AgentError {
    return new AgentError(
      "SOURCE_FAILURE",
      `Event source ${sourceName} failed: ${describeError(cause)}`,
      cause
    );
  }

  public static alreadyRunning(operation: string): AgentError {
    return new AgentError(
      "BUILD_ERROR",
      `Cannot ${operation}: the agent is already running`
    );
  }

  /** Setup calls and `run()` are only accepted while the agent is idle. */
  public static notIdle(operation: string, state: string): AgentError {
    return new AgentError("BUILD_ERROR", `Cannot ${operation}: the agent is ${state}`);
  }

  public static invalidConfig(detail: string): AgentError {
    return new AgentError("BUILD_ERROR", `Invalid agent configuration: ${detail}`);
  }

  public static from(error: unknown): AgentError {
    if (error instanceof AgentError) {
      return error;
    }
    return AgentError.sourceFailure("event stream", error);
  }
}
