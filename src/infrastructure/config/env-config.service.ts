import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvConfig, LogLevel } from './env.validation';

/**
 * Typed configuration service for environment variables.
 *
 * Values are validated at startup by the Zod schema, so getters
 * never see a malformed value.
 */
@Injectable()
export class EnvConfigService {
  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  get nodeEnv(): EnvConfig['NODE_ENV'] {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get logLevel(): LogLevel {
    const configured = this.configService.get('LOG_LEVEL', { infer: true });
    if (configured !== undefined) {
      return configured;
    }

    if (this.isProduction) return 'info';
    if (this.isTest) return 'silent';
    return 'debug';
  }

  get isDevelopment(): boolean {
    return this.nodeEnv === 'development';
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }

  get isTest(): boolean {
    return this.nodeEnv === 'test';
  }
}
