/**
 * A promise that is settled from the outside. Only the first `resolve` wins.
 */
export class Deferred<T> {
  public readonly promise: Promise<T>;

  private resolver: ((value: T) => void) | null = null;

  private settled = false;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolver = resolve;
    });
  }

  public get isSettled(): boolean {
    return this.settled;
  }

  public resolve(value: T): boolean {
    if (this.settled || !this.resolver) {
      return false;
    }
    this.settled = true;
    this.resolver(value);
    return true;
  }
}

/**
 * Races `work` against a timer. The work itself is not interrupted; a late
 * result or rejection is observed and dropped.
 */
export function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number | null,
  onTimeout: () => Error
): Promise<T> {
  if (timeoutMs === null) {
    return work;
  }
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
