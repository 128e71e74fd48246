import { randomUUID } from 'crypto';
import { InvalidValueException } from '../exceptions';

/**
 * Value Object representing a unique burger identifier.
 */
export class BurgerId {
  private constructor(public readonly value: string) {
    this.validate();
  }

  static fromString(id: string): BurgerId {
    return new BurgerId(id);
  }

  static generate(): BurgerId {
    return new BurgerId(`brg_${randomUUID()}`);
  }

  private validate(): void {
    if (!this.value || this.value.trim().length === 0) {
      throw new InvalidValueException('BurgerId', 'cannot be empty');
    }
  }

  equals(other: BurgerId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
