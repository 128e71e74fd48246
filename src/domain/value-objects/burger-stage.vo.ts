import { InvalidValueException } from '../exceptions';

const STAGES = ['created', 'prepared', 'cooked', 'served'] as const;

export type BurgerStageValue = (typeof STAGES)[number];

/**
 * Value Object representing where a burger is in the kitchen.
 * Burgers only move forward: created → prepared → cooked → served
 */
export class BurgerStage {
  private constructor(public readonly value: BurgerStageValue) {}

  static created(): BurgerStage {
    return new BurgerStage('created');
  }

  static prepared(): BurgerStage {
    return new BurgerStage('prepared');
  }

  static cooked(): BurgerStage {
    return new BurgerStage('cooked');
  }

  static served(): BurgerStage {
    return new BurgerStage('served');
  }

  static fromString(stage: string): BurgerStage {
    const normalized = stage.toLowerCase().trim();
    const match = STAGES.find((candidate) => candidate === normalized);

    if (match === undefined) {
      throw new InvalidValueException(
        'BurgerStage',
        `"${stage}" is not valid. Valid stages: ${STAGES.join(', ')}`,
      );
    }

    return new BurgerStage(match);
  }

  // Only the immediate successor is reachable
  canAdvanceTo(next: BurgerStage): boolean {
    return STAGES.indexOf(next.value) === STAGES.indexOf(this.value) + 1;
  }

  isServed(): boolean {
    return this.value === 'served';
  }

  equals(other: BurgerStage): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
