// src/infrastructure/observability/logging/logger.module.ts
import { Module } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import { EnvConfigService } from '../../config/env-config.service';
import { AppLoggerService } from './app-logger.service';

@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (envConfig: EnvConfigService): Params => ({
        pinoHttp: {
          level: envConfig.logLevel,

          // Readable output while developing, JSON everywhere else
          transport: envConfig.isDevelopment
            ? {
                target: 'pino-pretty',
                options: {
                  colorize: true,
                  singleLine: false,
                  translateTime: 'SYS:standard',
                  ignore: 'pid,hostname',
                },
              }
            : undefined,

          base: { service: 'burger-kitchen' },
        },
      }),
    }),
  ],
  providers: [AppLoggerService],
  exports: [PinoLoggerModule, AppLoggerService],
})
export class LoggerModule {}
