import { ConfigService } from '@nestjs/config';
import { EnvConfig, EnvConfigService } from '@infrastructure/config';

describe('EnvConfigService', () => {
  const createService = (values: Partial<EnvConfig>): EnvConfigService => {
    const configService = {
      get: jest.fn((key: keyof EnvConfig) => values[key]),
    } as unknown as ConfigService<EnvConfig, true>;

    return new EnvConfigService(configService);
  };

  it('should expose the node environment', () => {
    const service = createService({ NODE_ENV: 'production' });

    expect(service.nodeEnv).toBe('production');
    expect(service.isProduction).toBe(true);
    expect(service.isDevelopment).toBe(false);
    expect(service.isTest).toBe(false);
  });

  it('should prefer an explicit LOG_LEVEL', () => {
    expect(createService({ NODE_ENV: 'production', LOG_LEVEL: 'trace' }).logLevel).toBe('trace');
  });

  it.each<[EnvConfig['NODE_ENV'], string]>([
    ['production', 'info'],
    ['test', 'silent'],
    ['development', 'debug'],
  ])('should default the log level in %s to %s', (nodeEnv, level) => {
    expect(createService({ NODE_ENV: nodeEnv }).logLevel).toBe(level);
  });
});
