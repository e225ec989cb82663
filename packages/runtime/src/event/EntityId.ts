let nextEntityValue = 1;

/**
 * Opaque routing key for targeted events. Values are handed out
 * monotonically for the lifetime of the process and never reused.
 */
export class EntityId {
  private constructor(public readonly value: number) {}

  public static next(): EntityId {
    const id = new EntityId(nextEntityValue);
    nextEntityValue += 1;
    return id;
  }

  public equals(other: EntityId): boolean {
    return this.value === other.value;
  }

  public toString(): string {
    return `entity#${this.value}`;
  }
}
