import { Inject, Injectable } from '@nestjs/common';
import { fold } from '../../application/common/either';
import { OrderBurgerInputDto } from '../../application/dtos/burger-order.dto';
import { IOrderBurgerPort } from '../../application/ports/inbound/order-burger.port';
import { AppLoggerService } from '../observability/logging/app-logger.service';

export interface CustomerOrder extends OrderBurgerInputDto {
  readonly customer: string;
}

/**
 * The front counter: takes a customer's order, passes it to the kitchen
 * and reports back what the customer got.
 */
@Injectable()
export class OrderCounterService {
  constructor(
    @Inject('IOrderBurger')
    private readonly orderBurger: IOrderBurgerPort,
    private readonly appLogger: AppLoggerService,
  ) {}

  takeOrder(order: CustomerOrder): string {
    const result = this.orderBurger.execute({
      storeName: order.storeName,
      burgerType: order.burgerType,
    });

    return fold(
      result,
      (error) => {
        this.appLogger.logOrderRejected({
          customer: order.customer,
          storeName: order.storeName,
          burgerType: order.burgerType,
          code: error.code,
          reason: error.message,
        });
        return `${order.customer} could not order ${order.burgerType}: ${error.message}`;
      },
      (burger) => {
        this.appLogger.logBurgerOrder({
          customer: order.customer,
          storeName: burger.storeName,
          burgerId: burger.burgerId,
          burgerName: burger.name,
          steps: burger.kitchenLog.map((entry) => entry.step),
        });
        return `${order.customer} ordered a ${burger.name}`;
      },
    );
  }

  takeOrders(orders: readonly CustomerOrder[]): string[] {
    return orders.map((order) => this.takeOrder(order));
  }
}
