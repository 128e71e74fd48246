import { Module } from '@nestjs/common';
import { BurgerStore } from '../../application/stores/burger.store';
import { CheeseBurgerStore } from '../../application/stores/cheese-burger.store';
import { VeganBurgerStore } from '../../application/stores/vegan-burger.store';
import { OrderBurgerUseCase } from '../../application/use-cases/order-burger.use-case';

/**
 * Registers every burger store and exposes the ordering port.
 *
 * A new store only needs to be added to the 'IBurgerStores' list;
 * OrderBurgerUseCase and the stores already here stay untouched.
 */
@Module({
  providers: [
    CheeseBurgerStore,
    VeganBurgerStore,
    {
      provide: 'IBurgerStores',
      useFactory: (cheese: CheeseBurgerStore, vegan: VeganBurgerStore): BurgerStore[] => [
        cheese,
        vegan,
      ],
      inject: [CheeseBurgerStore, VeganBurgerStore],
    },
    {
      provide: 'IOrderBurger',
      useClass: OrderBurgerUseCase,
    },
  ],
  exports: ['IOrderBurger'],
})
export class KitchenModule {}
