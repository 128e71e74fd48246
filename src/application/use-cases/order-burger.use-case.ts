import { Inject, Injectable, Logger } from '@nestjs/common';
import { Burger } from '../../domain/entities';
import { Either, left, right } from '../common/either';
import {
  OrderBurgerError,
  StoreNotFoundError,
  UnexpectedError,
  ValidationError,
} from '../errors/application.errors';
import {
  BurgerOutputDto,
  OrderBurgerInputDto,
  StoreMenuOutputDto,
} from '../dtos/burger-order.dto';
import { IOrderBurgerPort } from '../ports/inbound/order-burger.port';
import { BurgerStore } from '../stores/burger.store';

/**
 * OrderBurgerUseCase is the entry point for a host that wants a burger.
 *
 * It picks the store by name and hands the burger type over untouched apart
 * from trimming and upper-casing it. Which burger gets built is entirely the
 * store's decision; an unknown type comes back as the store's own error.
 */
@Injectable()
export class OrderBurgerUseCase implements IOrderBurgerPort {
  private readonly logger = new Logger(OrderBurgerUseCase.name);

  constructor(
    @Inject('IBurgerStores')
    private readonly stores: BurgerStore[],
  ) {}

  execute(input: OrderBurgerInputDto): Either<OrderBurgerError, BurgerOutputDto> {
    try {
      const validationResult = this.validateInput(input);
      if (validationResult.isLeft()) {
        return validationResult;
      }

      const store = this.findStore(input.storeName);
      if (!store) {
        return left(new StoreNotFoundError(input.storeName));
      }

      const ordered = store.order(input.burgerType.trim().toUpperCase());
      if (ordered.isLeft()) {
        this.logger.warn(ordered.value.message);
        return ordered;
      }

      const burger = ordered.value;
      this.logger.log(`Making a ${burger.getName()}`);

      return right(this.mapToOutput(burger, store.name));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Order from '${input.storeName}' failed: ${message}`);
      return left(new UnexpectedError(message));
    }
  }

  getMenu(): StoreMenuOutputDto[] {
    return this.stores.map((store) => ({
      storeName: store.name,
      burgerTypes: [...store.menu],
    }));
  }

  // ============ Private Helper Methods ============

  private validateInput(input: OrderBurgerInputDto): Either<ValidationError, void> {
    if (!input.storeName || input.storeName.trim().length === 0) {
      return left(new ValidationError('Store name is required', 'storeName'));
    }

    if (!input.burgerType || input.burgerType.trim().length === 0) {
      return left(new ValidationError('Burger type is required', 'burgerType'));
    }

    return right(undefined);
  }

  private findStore(storeName: string): BurgerStore | undefined {
    const normalized = storeName.trim().toLowerCase();
    return this.stores.find((store) => store.name.toLowerCase() === normalized);
  }

  private mapToOutput(burger: Burger, storeName: string): BurgerOutputDto {
    return {
      burgerId: burger.id.toString(),
      name: burger.getName(),
      storeName,
      stage: burger.stage.toString(),
      base: burger.recipe.base,
      sauce: burger.recipe.sauce,
      toppings: burger.recipe.toppingList(),
      kitchenLog: burger.kitchenLog.map((entry) => ({ step: entry.step, note: entry.note })),
    };
  }
}
