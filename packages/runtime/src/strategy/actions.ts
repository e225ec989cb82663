import type { SystemType } from "../registry/SystemType.js";
import type { BusEvent } from "../types/events.js";
import type {
  AgentAction,
  ExecuteSystemAction,
  SendEventAction,
  StrategyResult,
  UpdateContextAction,
} from "../types/strategy.js";

export interface ExecuteSystemActionOptions {
  priority?: number;
  wait?: boolean;
  storeAs?: string;
}

export const Actions = {
  executeSystem<I, O>(
    system: SystemType<I, O>,
    input: I,
    options: ExecuteSystemActionOptions = {}
  ): ExecuteSystemAction {
    const storeAs = options.storeAs ?? null;
    return {
      kind: "execute_system",
      system,
      input,
      priority: options.priority ?? 0,
      // storing an output needs the output
      wait: storeAs !== null || (options.wait ?? false),
      storeAs,
    };
  },

  sendEvent<P, R>(event: BusEvent<P, R>): SendEventAction {
    return { kind: "send_event", event };
  },

  updateContext(key: string, value: unknown): UpdateContextAction {
    return { kind: "update_context", key, value };
  },
} as const;

export function continueWith(actions: AgentAction[] = [], response?: string): StrategyResult {
  return response === undefined
    ? { actions, shouldContinue: true }
    : { response, actions, shouldContinue: true };
}

export function stopWith(response?: string, actions: AgentAction[] = []): StrategyResult {
  return response === undefined
    ? { actions, shouldContinue: false }
    : { response, actions, shouldContinue: false };
}
