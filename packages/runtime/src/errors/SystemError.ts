import { AgentCoreError } from "./AgentCoreError.js";

export type SystemErrorCode = "EXECUTION_FAILED" | "NOT_FOUND" | "TIMEOUT";

export class SystemError extends AgentCoreError<SystemErrorCode> {
  public readonly systemName: string | null;

  public readonly executionId: number | null;

  private constructor(
    code: SystemErrorCode,
    message: string,
    systemName: string | null,
    executionId: number | null,
    cause?: unknown
  ) {
    super(code, message, cause);
    this.systemName = systemName;
    this.executionId = executionId;
  }

  public static executionFailed(
    systemName: string,
    executionId: number,
    reason: string,
    cause?: unknown
  ): SystemError {
    return new SystemError(
      "EXECUTION_FAILED",
      `System ${systemName} (execution ${executionId}) failed: ${reason}`,
      systemName,
      executionId,
      cause
    );
  }

  public static notRegistered(systemName: string): SystemError {
    return new SystemError(
      "NOT_FOUND",
      `System ${systemName} is not registered`,
      systemName,
      null
    );
  }

  public static unknownExecution(executionId: number): SystemError {
    return new SystemError(
      "NOT_FOUND",
      `Execution ${executionId} is unknown or has been evicted`,
      null,
      executionId
    );
  }

  public static timeout(
    systemName: string,
    executionId: number,
    timeoutMs: number
  ): SystemError {
    return new SystemError(
      "TIMEOUT",
      `System ${systemName} (execution ${executionId}) timed out after ${timeoutMs}ms`,
      systemName,
      executionId
    );
  }
}
