import type { SystemStatus } from "../types/systems.js";
import type { SystemHandle } from "./SystemHandle.js";

export interface ExecutionCounters {
  started: number;
  succeeded: number;
  failed: number;
}

/**
 * Follows every system invocation started on behalf of the loop, whether it
 * came from a returned action or a direct call, so draining can wait for
 * them and metrics can count their outcomes.
 */
export class ExecutionTracker {
  private readonly pending = new Map<number, Promise<SystemStatus>>();

  private readonly counters: ExecutionCounters = { started: 0, succeeded: 0, failed: 0 };

  public track<O>(handle: SystemHandle<O>): SystemHandle<O> {
    this.counters.started += 1;
    const { executionId } = handle;
    const settled = handle.settled.then((status) => {
      this.pending.delete(executionId);
      if (status.state === "completed") {
        this.counters.succeeded += 1;
      } else {
        this.counters.failed += 1;
      }
      return status;
    });
    this.pending.set(executionId, settled);
    return handle;
  }

  public get inFlight(): number[] {
    return Array.from(this.pending.keys());
  }

  public snapshot(): ExecutionCounters {
    return { ...this.counters };
  }

  /**
   * Waits for every tracked invocation, at most `timeoutMs`. Resolves with
   * the ids that were still unfinished.
   */
  public async drain(timeoutMs: number): Promise<number[]> {
    if (this.pending.size === 0) {
      return [];
    }
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    await Promise.race([Promise.all(this.pending.values()), expired]);
    clearTimeout(timer);
    return this.inFlight;
  }
}
