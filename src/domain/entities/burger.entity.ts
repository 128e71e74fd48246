import { InvalidBurgerStageException } from '../exceptions';
import { BurgerId, BurgerRecipe, BurgerStage } from '../value-objects';

export type BurgerStep = 'prepare' | 'cook' | 'serve';

export interface KitchenLogEntry {
  readonly step: BurgerStep;
  readonly note: string;
}

/**
 * Entity representing a burger being made in the kitchen.
 *
 * The lifecycle is fixed here: prepare, cook and serve must each run once,
 * in that order. Variants only decide what happens during each step by
 * implementing the `on*` hooks.
 */
export abstract class Burger {
  private _stage: BurgerStage = BurgerStage.created();
  private readonly _kitchenLog: KitchenLogEntry[] = [];

  protected constructor(
    public readonly id: BurgerId,
    public readonly name: string,
    public readonly recipe: BurgerRecipe,
  ) {
    if (!name || name.trim().length === 0) {
      throw new Error('Burger name cannot be empty');
    }
  }

  get stage(): BurgerStage {
    return this._stage;
  }

  get kitchenLog(): readonly KitchenLogEntry[] {
    return [...this._kitchenLog];
  }

  get steps(): BurgerStep[] {
    return this._kitchenLog.map((entry) => entry.step);
  }

  getName(): string {
    return this.name;
  }

  prepare(): void {
    this.advance('prepare', BurgerStage.prepared(), () => this.onPrepare());
  }

  cook(): void {
    this.advance('cook', BurgerStage.cooked(), () => this.onCook());
  }

  serve(): void {
    this.advance('serve', BurgerStage.served(), () => this.onServe());
  }

  isServed(): boolean {
    return this._stage.isServed();
  }

  equals(other: Burger): boolean {
    return this.id.equals(other.id);
  }

  toSummary(): string {
    return `${this.name}: ${this.recipe.toString()} (${this._stage.toString()})`;
  }

  // Each hook returns the kitchen note for its step
  protected abstract onPrepare(): string;
  protected abstract onCook(): string;
  protected abstract onServe(): string;

  private advance(step: BurgerStep, target: BurgerStage, perform: () => string): void {
    if (!this._stage.canAdvanceTo(target)) {
      throw new InvalidBurgerStageException(this.name, step, this._stage.toString());
    }

    const note = perform();
    this._stage = target;
    this._kitchenLog.push({ step, note });
  }
}
