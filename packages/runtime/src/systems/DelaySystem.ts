import { setTimeout as sleep } from "node:timers/promises";
import { defineSystem } from "../registry/SystemType.js";
import type { SystemAdapter } from "../types/systems.js";

export const Delay = defineSystem<number, number>("delay");

/** Waits `input` milliseconds and resolves with the time actually waited. */
export class DelaySystem implements SystemAdapter<number, number> {
  public readonly type = Delay;

  public readonly description = "Resolves after the given number of milliseconds";

  constructor(public readonly timeoutMs?: number) {}

  public async run(input: number): Promise<number> {
    const startedAt = Date.now();
    await sleep(Math.max(0, input));
    return Date.now() - startedAt;
  }
}
