import { Injectable } from '@nestjs/common';
import { Burger, CheeseBurger, DeluxeCheeseBurger } from '../../domain/entities';
import { Either, left, right } from '../common/either';
import { UnrecognizedBurgerTypeError } from '../errors/application.errors';
import { BurgerStore } from './burger.store';

export const CHEESE_BURGER_MENU = ['CHEESE', 'DELUXE_CHEESE'] as const;

export type CheeseBurgerType = (typeof CHEESE_BURGER_MENU)[number];

@Injectable()
export class CheeseBurgerStore extends BurgerStore<CheeseBurgerType> {
  readonly name = 'cheese';
  readonly menu = CHEESE_BURGER_MENU;

  createBurger(type: string): Either<UnrecognizedBurgerTypeError, Burger> {
    if (!this.sells(type)) {
      return left(this.unrecognized(type));
    }

    switch (type) {
      case 'CHEESE':
        return right(CheeseBurger.create());
      case 'DELUXE_CHEESE':
        return right(DeluxeCheeseBurger.create());
    }
  }
}
