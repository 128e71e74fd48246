import { BurgerId, BurgerRecipe } from '../value-objects';
import { Burger } from './burger.entity';

export class DeluxeVeganBurger extends Burger {
  private constructor(id: BurgerId) {
    super(
      id,
      'DeluxeVeganBurger',
      BurgerRecipe.create({
        base: 'double plant patty on a pretzel bun',
        sauce: 'chipotle aioli',
        toppings: ['avocado', 'vegan cheddar', 'caramelized onion', 'arugula'],
      }),
    );
  }

  static create(id?: BurgerId): DeluxeVeganBurger {
    return new DeluxeVeganBurger(id ?? BurgerId.generate());
  }

  protected onPrepare(): string {
    return 'Toasted the pretzel bun and mashed the avocado';
  }

  protected onCook(): string {
    return 'Griddled two plant patties and melted vegan cheddar';
  }

  protected onServe(): string {
    return 'Served on a board with chipotle aioli on the side';
  }
}
