/**
 * Base class for every error raised by the runtime. Each subclass narrows
 * `code` to its own union so callers can switch on it.
 */
export abstract class AgentCoreError<TCode extends string> extends Error {
  public readonly code: TCode;

  protected constructor(code: TCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
