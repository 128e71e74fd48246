import { BurgerId, BurgerRecipe } from '../value-objects';
import { Burger } from './burger.entity';

export class VeganBurger extends Burger {
  private constructor(id: BurgerId) {
    super(
      id,
      'VeganBurger',
      BurgerRecipe.create({
        base: 'plant patty on a whole wheat bun',
        sauce: 'vegan mayo',
        toppings: ['lettuce', 'tomato', 'onion'],
      }),
    );
  }

  static create(id?: BurgerId): VeganBurger {
    return new VeganBurger(id ?? BurgerId.generate());
  }

  protected onPrepare(): string {
    return 'Toasted the whole wheat bun and sliced tomato and onion';
  }

  protected onCook(): string {
    return 'Griddled the plant patty';
  }

  protected onServe(): string {
    return 'Served wrapped in paper';
  }
}
