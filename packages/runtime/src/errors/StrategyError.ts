import { AgentCoreError, describeError } from "./AgentCoreError.js";

export type StrategyErrorCode = "RECOVERABLE" | "FATAL";

export type StrategyErrorSeverity = "recoverable" | "fatal";

/**
 * Raised from `Strategy.process`. Recoverable errors are logged and the loop
 * moves on to the next event; fatal errors stop the loop.
 */
export class StrategyError extends AgentCoreError<StrategyErrorCode> {
  private constructor(code: StrategyErrorCode, message: string, cause?: unknown) {
    super(code, message, cause);
  }

  public get severity(): StrategyErrorSeverity {
    return this.code === "FATAL" ? "fatal" : "recoverable";
  }

  public static recoverable(message: string, cause?: unknown): StrategyError {
    return new StrategyError("RECOVERABLE", message, cause);
  }

  public static fatal(message: string, cause?: unknown): StrategyError {
    return new StrategyError("FATAL", message, cause);
  }

  /** Anything that is not already a StrategyError counts as recoverable. */
  public static from(error: unknown): StrategyError {
    if (error instanceof StrategyError) {
      return error;
    }
    return StrategyError.recoverable(describeError(error), error);
  }
}
