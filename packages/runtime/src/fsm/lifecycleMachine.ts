import { assign, setup } from "xstate";
import type { AgentError, StrategyError } from "../errors/index.js";
import type { LifecycleState, StopReason } from "../types/agent.js";

export interface LifecycleContext {
  agentId: string;
  startedAt: number | null;
  finishedAt: number | null;
  stopReason: StopReason | null;
  /** 致命策略错误，随停止原因 fatal 一起记录 */
  fatalError: StrategyError | null;
  /** 事件源失败时的错误 */
  failure: AgentError | null;
}

export type LifecycleEvent =
  | { type: "START" }
  | { type: "DRAIN"; reason: StopReason; error?: StrategyError }
  | { type: "DRAINED" }
  | { type: "FAIL"; error: AgentError };

const LIFECYCLE_STATES: readonly LifecycleState[] = [
  "idle",
  "running",
  "draining",
  "stopped",
  "failed",
];

export function isLifecycleState(value: unknown): value is LifecycleState {
  return LIFECYCLE_STATES.some((state) => state === value);
}

/**
 * idle → running → draining → stopped, with running → failed on a source
 * failure. A DRAIN received while idle stops at once. The first DRAIN wins;
 * later ones are ignored.
 */
export function createLifecycleMachine(agentId: string) {
  return setup({
    types: {
      context: {} as LifecycleContext,
      events: {} as LifecycleEvent,
    },
    actions: {
      markStarted: assign({ startedAt: () => Date.now() }),
      markFinished: assign({ finishedAt: () => Date.now() }),
      recordStopReason: assign(({ event }) =>
        event.type === "DRAIN"
          ? { stopReason: event.reason, fatalError: event.error ?? null }
          : {}
      ),
      recordFailure: assign(({ event }) =>
        event.type === "FAIL" ? { failure: event.error } : {}
      ),
    },
  }).createMachine({
    id: `agent-lifecycle-${agentId}`,
    initial: "idle",
    context: {
      agentId,
      startedAt: null,
      finishedAt: null,
      stopReason: null,
      fatalError: null,
      failure: null,
    },
    states: {
      idle: {
        on: {
          START: { target: "running", actions: "markStarted" },
          DRAIN: { target: "stopped", actions: ["recordStopReason", "markFinished"] },
        },
      },
      running: {
        on: {
          DRAIN: { target: "draining", actions: "recordStopReason" },
          FAIL: { target: "failed", actions: ["recordFailure", "markFinished"] },
        },
      },
      draining: {
        on: {
          DRAINED: { target: "stopped", actions: "markFinished" },
        },
      },
      stopped: { type: "final" },
      failed: { type: "final" },
    },
  });
}

export type LifecycleMachine = ReturnType<typeof createLifecycleMachine>;
