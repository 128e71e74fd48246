import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { CustomerOrder, OrderCounterService } from './infrastructure';

const DEMO_ORDERS: CustomerOrder[] = [
  { customer: 'Ethan', storeName: 'cheese', burgerType: 'CHEESE' },
  { customer: 'Joel', storeName: 'vegan', burgerType: 'VEGAN' },
  // The vegan store does not make cheese burgers
  { customer: 'Mia', storeName: 'vegan', burgerType: 'CHEESE' },
];

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));

  const counter = app.get(OrderCounterService);
  const lines = counter.takeOrders(DEMO_ORDERS);

  console.log(`\n${lines.join('\n')}`);

  await app.close();
}

void bootstrap();
