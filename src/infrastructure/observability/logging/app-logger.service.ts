// src/infrastructure/observability/logging/app-logger.service.ts
import { Injectable } from '@nestjs/common';
import { PinoLogger, InjectPinoLogger } from 'nestjs-pino';

@Injectable()
export class AppLoggerService {
  constructor(
    @InjectPinoLogger(AppLoggerService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * A burger made it through the kitchen and reached a customer.
   */
  logBurgerOrder(context: {
    customer: string;
    storeName: string;
    burgerId: string;
    burgerName: string;
    steps: string[];
  }): void {
    this.logger.info(
      {
        component: 'kitchen',
        ...context,
      },
      `${context.customer} ordered a ${context.burgerName}`,
    );
  }

  logOrderRejected(context: {
    customer: string;
    storeName: string;
    burgerType: string;
    code: string;
    reason: string;
  }): void {
    this.logger.warn(
      {
        component: 'kitchen',
        ...context,
      },
      `Order for ${context.burgerType} from '${context.storeName}' rejected: ${context.code}`,
    );
  }
}
