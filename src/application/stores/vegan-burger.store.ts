import { Injectable } from '@nestjs/common';
import { Burger, DeluxeVeganBurger, VeganBurger } from '../../domain/entities';
import { Either, left, right } from '../common/either';
import { UnrecognizedBurgerTypeError } from '../errors/application.errors';
import { BurgerStore } from './burger.store';

export const VEGAN_BURGER_MENU = ['VEGAN', 'DELUXE_VEGAN'] as const;

export type VeganBurgerType = (typeof VEGAN_BURGER_MENU)[number];

@Injectable()
export class VeganBurgerStore extends BurgerStore<VeganBurgerType> {
  readonly name = 'vegan';
  readonly menu = VEGAN_BURGER_MENU;

  createBurger(type: string): Either<UnrecognizedBurgerTypeError, Burger> {
    if (!this.sells(type)) {
      return left(this.unrecognized(type));
    }

    switch (type) {
      case 'VEGAN':
        return right(VeganBurger.create());
      case 'DELUXE_VEGAN':
        return right(DeluxeVeganBurger.create());
    }
  }
}
