import * as Joi from 'joi';
import { registerAs } from '@nestjs/config';
import { LogLevel } from '@nestjs/common';
import { APP_CONSTANTS } from '../common/constants/app.constants';
import { validateEnv } from '../common/utils/validation.util';

export type Environment = 'development' | 'staging' | 'production' | 'test';

export type AppLogLevel = 'error' | 'warn' | 'log' | 'debug' | 'verbose';

export interface AppConfig {
  name: string;
  version: string;
  environment: Environment;
  logLevel: AppLogLevel;
}

// Interface for validated environment variables
export interface ValidatedEnv {
  NODE_ENV: Environment;
  LOG_LEVEL: AppLogLevel;
}

const LOG_LEVELS: AppLogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

const configSchema = Joi.object<ValidatedEnv>({
  NODE_ENV: Joi.string()
    .valid('development', 'staging', 'production', 'test')
    .default('development'),
  LOG_LEVEL: Joi.string()
    .valid(...LOG_LEVELS)
    .default('log'),
});

export function validateConfig(config: Record<string, unknown>): ValidatedEnv {
  return validateEnv(configSchema, config, 'Application');
}

function createAppConfig(env: ValidatedEnv): AppConfig {
  return {
    name: APP_CONSTANTS.APP.NAME,
    version: APP_CONSTANTS.APP.VERSION,
    environment: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
  };
}

/**
 * Nest logger levels enabled at the given threshold, most severe first
 */
export function resolveLogLevels(level: AppLogLevel): LogLevel[] {
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
}

export const appConfig = registerAs('app', () => {
  const validatedEnv = validateConfig(process.env);
  return createAppConfig(validatedEnv);
});
