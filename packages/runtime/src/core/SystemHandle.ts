import type { SystemSettlement, SystemStatus } from "../types/systems.js";

export interface ExecutionControl {
  getExecutionStatus(executionId: number): SystemStatus | undefined;
  cancel(executionId: number): boolean;
}

export interface SystemHandleInit<O> {
  executionId: number;
  systemName: string;
  settlement: Promise<SystemSettlement<O>>;
  control: ExecutionControl;
}

/**
 * Reference to one system invocation. Dropping a handle leaves the
 * invocation running; its result simply goes unobserved.
 */
export class SystemHandle<O> {
  public readonly executionId: number;

  public readonly systemName: string;

  private readonly settlement: Promise<SystemSettlement<O>>;

  private readonly control: ExecutionControl;

  constructor(init: SystemHandleInit<O>) {
    this.executionId = init.executionId;
    this.systemName = init.systemName;
    this.settlement = init.settlement;
    this.control = init.control;
  }

  /** Suspends until the body resolves; rejects with a `SystemError`. */
  public async wait(): Promise<O> {
    const settlement = await this.settlement;
    if (settlement.ok) {
      return settlement.value;
    }
    throw settlement.error;
  }

  /** Resolves with the terminal status; never rejects. */
  public get settled(): Promise<SystemStatus> {
    return this.settlement.then((settlement) => settlement.status);
  }

  public status(): SystemStatus | undefined {
    return this.control.getExecutionStatus(this.executionId);
  }

  public cancel(): boolean {
    return this.control.cancel(this.executionId);
  }
}
