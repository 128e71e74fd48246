import { Module } from '@nestjs/common';
import { KitchenModule } from '../kitchen/kitchen.module';
import { LoggerModule } from '../observability/logging/logger.module';
import { OrderCounterService } from './order-counter.service';

@Module({
  imports: [KitchenModule, LoggerModule],
  providers: [OrderCounterService],
  exports: [OrderCounterService],
})
export class CounterModule {}
