import type { SystemAdapter } from "../types/systems.js";

/**
 * Identity token for one system. Binding is keyed by the token, so an
 * input/output pair is checked where the system is registered and where it
 * is executed.
 */
export class SystemType<I, O> {
  private readonly adapters = new WeakMap<object, SystemAdapter<I, O>>();

  constructor(public readonly name: string) {}

  /** @internal returns the adapter it replaced, if any */
  public bindAdapter(owner: object, adapter: SystemAdapter<I, O>): SystemAdapter<I, O> | undefined {
    const previous = this.adapters.get(owner);
    this.adapters.set(owner, adapter);
    return previous;
  }

  /** @internal */
  public adapterFor(owner: object): SystemAdapter<I, O> | undefined {
    return this.adapters.get(owner);
  }
}

export function defineSystem<I, O>(name: string): SystemType<I, O> {
  return new SystemType<I, O>(name);
}
