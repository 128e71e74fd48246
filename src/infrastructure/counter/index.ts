export { CounterModule } from './counter.module';
export { OrderCounterService, CustomerOrder } from './order-counter.service';
