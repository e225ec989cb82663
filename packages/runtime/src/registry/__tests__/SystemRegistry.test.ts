import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { SystemError } from "../../errors/index.js";
import { DelaySystem, Delay } from "../../systems/DelaySystem.js";
import { Echo, EchoSystem } from "../../systems/EchoSystem.js";
import type { SystemAdapter, SystemStatusChange } from "../../types/systems.js";
import { SystemRegistry } from "../SystemRegistry.js";
import { defineSystem } from "../SystemType.js";

const Failing = defineSystem<string, string>("failing");
const Recorder = defineSystem<string, string>("recorder");
const Unregistered = defineSystem<string, string>("unknown");

const failingSystem: SystemAdapter<string, string> = {
  type: Failing,
  description: "always fails",
  run: async () => {
    throw new Error("nope");
  },
};

function recorderSystem(started: string[]): SystemAdapter<string, string> {
  return {
    type: Recorder,
    description: "records start order",
    run: async (input) => {
      started.push(input);
      await sleep(5);
      return input;
    },
  };
}

describe("SystemRegistry execution", () => {
  it("echoes ping and reports completion", async () => {
    const registry = new SystemRegistry();
    registry.registerSystem(new EchoSystem());

    const handle = registry.execute(Echo, "ping");

    await expect(handle.wait()).resolves.toBe("ping");
    expect(handle.status()).toMatchObject({ state: "completed" });
  });

  it("moves through pending, running and completed", async () => {
    const registry = new SystemRegistry();
    registry.registerSystem(new EchoSystem());
    const changes: SystemStatusChange[] = [];
    const subscription = registry.statusChanges().subscribe((change) => changes.push(change));

    const handle = registry.execute(Echo, "ping");
    expect(handle.status()).toEqual({ state: "pending" });
    await handle.wait();
    subscription.unsubscribe();

    expect(changes.map((change) => change.current.state)).toEqual([
      "pending",
      "running",
      "completed",
    ]);
    expect(changes.map((change) => change.previous?.state ?? null)).toEqual([
      null,
      "pending",
      "running",
    ]);
    expect(changes.every((change) => change.executionId === handle.executionId)).toBe(true);
  });

  it("never reuses execution ids, even after eviction", async () => {
    const registry = new SystemRegistry({ maxHistory: 2 });
    registry.registerSystem(new EchoSystem());

    const ids: number[] = [];
    for (const input of ["a", "b", "c"]) {
      const handle = registry.execute(Echo, input);
      ids.push(handle.executionId);
      await handle.wait();
    }

    expect(ids).toEqual([1, 2, 3]);
    expect(registry.getExecution(1)).toBeUndefined();
    expect(registry.getExecutionStatus(1)).toBeUndefined();
    expect(() => registry.requireExecution(1)).toThrow("Execution 1 is unknown or has been evicted");
    expect(registry.requireExecution(3)).toMatchObject({
      executionId: 3,
      systemName: "echo",
      status: { state: "completed" },
    });
  });

  it("reports a failing body as EXECUTION_FAILED", async () => {
    const registry = new SystemRegistry();
    registry.registerSystem(failingSystem);

    const handle = registry.execute(Failing, "x");
    const error = await handle.wait().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(SystemError);
    expect(error).toMatchObject({
      code: "EXECUTION_FAILED",
      message: "System failing (execution 1) failed: nope",
    });
    expect(handle.status()).toEqual({
      state: "failed",
      reason: "System failing (execution 1) failed: nope",
    });
    expect(registry.getSystemMetrics().failing).toMatchObject({
      executions: 1,
      successes: 0,
      failures: 1,
    });
  });

  it("throws NOT_FOUND synchronously for an unregistered system", () => {
    const registry = new SystemRegistry();

    expect(() => registry.execute(Unregistered, "x")).toThrow("System unknown is not registered");
  });

  it("replaces an earlier registration", async () => {
    const registry = new SystemRegistry();
    registry.registerSystem({ type: Echo, description: "v1", run: async () => "v1" });
    registry.registerSystem({ type: Echo, description: "v2", run: async () => "v2" });

    await expect(registry.execute(Echo, "x").wait()).resolves.toBe("v2");
    expect(registry.list()).toEqual([{ name: "echo", description: "v2" }]);
  });

  it("rejects registration while sealed", () => {
    const registry = new SystemRegistry();
    registry.seal();

    expect(() => registry.registerSystem(new EchoSystem())).toThrow(
      "Cannot register system echo: the agent is already running"
    );
  });
});

describe("SystemRegistry timeouts and cancellation", () => {
  it("fails an invocation that outlives its timeout", async () => {
    const registry = new SystemRegistry({ defaultTimeoutMs: 20 });
    registry.registerSystem(new DelaySystem());

    const handle = registry.execute(Delay, 200);

    await expect(handle.wait()).rejects.toMatchObject({
      code: "TIMEOUT",
      message: "System delay (execution 1) timed out after 20ms",
    });
    expect(registry.getSystemMetrics().delay).toMatchObject({ failures: 1, timeouts: 1 });
  });

  it("prefers the system's own timeout over the default", async () => {
    const registry = new SystemRegistry({ defaultTimeoutMs: 1_000 });
    registry.registerSystem(new DelaySystem(10));

    await expect(registry.execute(Delay, 200).wait()).rejects.toMatchObject({
      message: "System delay (execution 1) timed out after 10ms",
    });
  });

  it("marks a cancelled invocation failed and discards its result", async () => {
    const registry = new SystemRegistry();
    registry.registerSystem(new DelaySystem());

    const handle = registry.execute(Delay, 30);

    expect(handle.cancel()).toBe(true);
    expect(handle.cancel()).toBe(false);
    expect(handle.status()).toEqual({ state: "failed", reason: "cancelled" });
    await expect(handle.wait()).rejects.toMatchObject({
      code: "EXECUTION_FAILED",
      message: "System delay (execution 1) failed: cancelled",
    });
    await expect(handle.settled).resolves.toEqual({ state: "failed", reason: "cancelled" });
    expect(registry.inFlight()).toEqual([]);
    expect(registry.getSystemMetrics().delay).toMatchObject({
      executions: 1,
      failures: 1,
      cancellations: 1,
    });
  });

  it("passes a cancelled pending invocation through running without starting it", async () => {
    const registry = new SystemRegistry();
    const started: string[] = [];
    registry.registerSystem(recorderSystem(started));
    const changes: SystemStatusChange[] = [];
    const subscription = registry.statusChanges().subscribe((change) => changes.push(change));

    const handle = registry.execute(Recorder, "x");
    handle.cancel();
    await handle.settled;
    await sleep(10);
    subscription.unsubscribe();

    expect(changes.map((change) => change.current)).toEqual([
      { state: "pending" },
      { state: "running" },
      { state: "failed", reason: "cancelled" },
    ]);
    expect(started).toEqual([]);
    expect(registry.getExecution(1)?.startedAt).not.toBeNull();
  });

  it("holds a concurrency slot until a timed-out body actually finishes", async () => {
    const registry = new SystemRegistry({ maxConcurrent: 1 });
    let active = 0;
    let peak = 0;
    registry.registerSystem({
      type: Recorder,
      description: "outlives its timeout",
      timeoutMs: 10,
      run: async (input) => {
        active += 1;
        peak = Math.max(peak, active);
        await sleep(40);
        active -= 1;
        return input;
      },
    });

    const results = await Promise.allSettled(
      ["a", "b", "c"].map((input) => registry.execute(Recorder, input).wait())
    );
    await sleep(60);

    expect(results.map((result) => result.status)).toEqual(["rejected", "rejected", "rejected"]);
    expect(peak).toBe(1);
    expect(active).toBe(0);
    expect(registry.getSystemMetrics().recorder).toMatchObject({ timeouts: 3 });
  });
});

describe("SystemRegistry scheduling", () => {
  it("starts waiting invocations by priority, then by id", async () => {
    const registry = new SystemRegistry({ maxConcurrent: 1 });
    const started: string[] = [];
    registry.registerSystem(recorderSystem(started));

    const handles = [
      registry.execute(Recorder, "low"),
      registry.execute(Recorder, "high", { priority: 5 }),
      registry.execute(Recorder, "mid", { priority: 1 }),
      registry.execute(Recorder, "mid-later", { priority: 1 }),
    ];
    await Promise.all(handles.map((handle) => handle.wait()));

    expect(started).toEqual(["high", "mid", "mid-later", "low"]);
  });

  it("never runs more bodies than maxConcurrent", async () => {
    const registry = new SystemRegistry({ maxConcurrent: 2 });
    let active = 0;
    let peak = 0;
    registry.registerSystem({
      type: Recorder,
      description: "tracks overlap",
      run: async (input) => {
        active += 1;
        peak = Math.max(peak, active);
        await sleep(10);
        active -= 1;
        return input;
      },
    });

    await Promise.all(
      ["a", "b", "c", "d", "e"].map((input) => registry.execute(Recorder, input).wait())
    );

    expect(peak).toBe(2);
  });

  it("keeps per-system metrics and clears finished history", async () => {
    const registry = new SystemRegistry();
    registry.registerSystem(new EchoSystem());

    await registry.execute(Echo, "a").wait();
    await registry.execute(Echo, "b").wait();

    const metrics = registry.getSystemMetrics().echo;
    expect(metrics).toMatchObject({
      systemName: "echo",
      executions: 2,
      successes: 2,
      failures: 0,
      timeouts: 0,
      cancellations: 0,
    });
    expect(metrics?.averageDurationMs).toBeGreaterThanOrEqual(0);
    expect(metrics?.lastExecutedAt).not.toBeNull();

    registry.clearHistory();
    expect(registry.getExecution(1)).toBeUndefined();
    expect(registry.getExecution(2)).toBeUndefined();
  });
});
