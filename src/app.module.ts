import { Module } from '@nestjs/common';
import { ConfigModule } from './infrastructure/config/config.module';
import { CounterModule } from './infrastructure/counter/counter.module';

@Module({
  imports: [
    // Validated environment, available everywhere
    ConfigModule,

    // Front counter, which pulls in the kitchen and logging
    CounterModule,
  ],
})
export class AppModule {}
