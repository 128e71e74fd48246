export { ConfigModule } from './config.module';
export { EnvConfigService } from './env-config.service';
export { envSchema, validateEnv, EnvConfig, LogLevel, LOG_LEVELS } from './env.validation';
