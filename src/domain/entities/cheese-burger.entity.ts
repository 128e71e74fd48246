import { BurgerId, BurgerRecipe } from '../value-objects';
import { Burger } from './burger.entity';

export class CheeseBurger extends Burger {
  private constructor(id: BurgerId) {
    super(
      id,
      'CheeseBurger',
      BurgerRecipe.create({
        base: 'beef patty on a sesame bun',
        sauce: 'ketchup',
        toppings: ['cheddar', 'pickles', 'onion'],
      }),
    );
  }

  static create(id?: BurgerId): CheeseBurger {
    return new CheeseBurger(id ?? BurgerId.generate());
  }

  protected onPrepare(): string {
    return 'Toasted the sesame bun and sliced pickles and onion';
  }

  protected onCook(): string {
    return 'Grilled the beef patty and melted cheddar on top';
  }

  protected onServe(): string {
    return 'Served wrapped in paper';
  }
}
