import { BurgerId, BurgerRecipe } from '../value-objects';
import { Burger } from './burger.entity';

export class DeluxeCheeseBurger extends Burger {
  private constructor(id: BurgerId) {
    super(
      id,
      'DeluxeCheeseBurger',
      BurgerRecipe.create({
        base: 'double beef patty on a brioche bun',
        sauce: 'house sauce',
        toppings: ['aged cheddar', 'bacon', 'lettuce', 'tomato'],
      }),
    );
  }

  static create(id?: BurgerId): DeluxeCheeseBurger {
    return new DeluxeCheeseBurger(id ?? BurgerId.generate());
  }

  protected onPrepare(): string {
    return 'Toasted the brioche bun and layered lettuce and tomato';
  }

  protected onCook(): string {
    return 'Flame-grilled two beef patties with aged cheddar and crisped the bacon';
  }

  protected onServe(): string {
    return 'Served on a board with house sauce on the side';
  }
}
