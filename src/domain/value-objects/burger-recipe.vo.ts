import { InvalidValueException } from '../exceptions';

/**
 * Value Object describing what goes into a burger.
 * Toppings form a set: order does not matter and duplicates are rejected.
 */
export class BurgerRecipe {
  private constructor(
    public readonly base: string,
    public readonly sauce: string,
    private readonly _toppings: ReadonlySet<string>,
  ) {}

  static create(props: { base: string; sauce: string; toppings: readonly string[] }): BurgerRecipe {
    const base = props.base.trim();
    const sauce = props.sauce.trim();

    if (base.length === 0) {
      throw new InvalidValueException('BurgerRecipe', 'base cannot be empty');
    }
    if (sauce.length === 0) {
      throw new InvalidValueException('BurgerRecipe', 'sauce cannot be empty');
    }

    const toppings = new Set<string>();
    for (const raw of props.toppings) {
      const topping = raw.trim().toLowerCase();
      if (topping.length === 0) {
        throw new InvalidValueException('BurgerRecipe', 'toppings cannot be blank');
      }
      if (toppings.has(topping)) {
        throw new InvalidValueException('BurgerRecipe', `duplicate topping "${raw}"`);
      }
      toppings.add(topping);
    }

    return new BurgerRecipe(base, sauce, toppings);
  }

  get toppings(): ReadonlySet<string> {
    return new Set(this._toppings);
  }

  hasTopping(topping: string): boolean {
    return this._toppings.has(topping.trim().toLowerCase());
  }

  toppingList(): string[] {
    return [...this._toppings].sort();
  }

  equals(other: BurgerRecipe): boolean {
    return (
      this.base === other.base &&
      this.sauce === other.sauce &&
      this._toppings.size === other._toppings.size &&
      [...this._toppings].every((topping) => other._toppings.has(topping))
    );
  }

  toString(): string {
    const toppings = this.toppingList();
    const toppingText = toppings.length > 0 ? `, topped with ${toppings.join(', ')}` : '';
    return `${this.base} with ${this.sauce}${toppingText}`;
  }
}
