import { Burger } from '../../domain/entities';
import { Either, right } from '../common/either';
import { UnrecognizedBurgerTypeError } from '../errors/application.errors';

/**
 * A store decides WHICH burger to make; how a burger is made is fixed here.
 *
 * Subclasses implement `createBurger` for their own closed menu. `order` is
 * the shared sequence every store follows and is not meant to be overridden:
 * create, prepare, cook, serve.
 */
export abstract class BurgerStore<TType extends string = string> {
  abstract readonly name: string;
  abstract readonly menu: readonly TType[];

  /**
   * Build a fresh, untouched burger for `type`, or explain why not.
   * Must never fall back to a different burger.
   */
  abstract createBurger(type: string): Either<UnrecognizedBurgerTypeError, Burger>;

  order(type: string): Either<UnrecognizedBurgerTypeError, Burger> {
    const created = this.createBurger(type);
    if (created.isLeft()) {
      return created;
    }

    const burger = created.value;
    burger.prepare();
    burger.cook();
    burger.serve();

    return right(burger);
  }

  sells(type: string): type is TType {
    return this.menu.some((item) => item === type);
  }

  protected unrecognized(type: string): UnrecognizedBurgerTypeError {
    return new UnrecognizedBurgerTypeError(this.name, type, this.menu);
  }
}
