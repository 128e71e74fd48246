import { Either } from '../../common/either';
import { OrderBurgerError } from '../../errors/application.errors';
import {
  BurgerOutputDto,
  OrderBurgerInputDto,
  StoreMenuOutputDto,
} from '../../dtos/burger-order.dto';

export interface IOrderBurgerPort {
  /**
   * Order a burger from one of the registered stores.
   *
   * The store builds the burger and runs it through prepare, cook and serve
   * before it is returned.
   *
   * @param input - Store name and burger type
   * @returns Either an error or the served burger
   */
  execute(input: OrderBurgerInputDto): Either<OrderBurgerError, BurgerOutputDto>;

  /**
   * List every registered store with the burger types it makes.
   */
  getMenu(): StoreMenuOutputDto[];
}
