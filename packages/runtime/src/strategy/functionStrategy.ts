import type { Strategy } from "../types/strategy.js";

/** Wraps a plain async function as a named strategy. */
export function strategyFromFunction(
  name: string,
  decide: Strategy["process"]
): Strategy {
  return {
    name,
    process: (event, context, tools) => decide(event, context, tools),
  };
}
