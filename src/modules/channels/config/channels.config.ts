import { registerAs } from '@nestjs/config';
import * as Joi from 'joi';
import { APP_CONSTANTS } from '../../../common/constants/app.constants';
import { validateEnv } from '../../../common/utils/validation.util';

export interface CircuitBreakerConfig {
  enabled: boolean;
  failureThreshold: number;
  openTimeoutMs: number;
}

export interface ChannelsConfig {
  circuitBreaker: CircuitBreakerConfig;
  email: { enabled: boolean };
  sms: { enabled: boolean; simulateFailure: boolean };
}

interface ValidatedChannelsEnv {
  CIRCUIT_BREAKER_ENABLED: boolean;
  CIRCUIT_BREAKER_FAILURE_THRESHOLD: number;
  CIRCUIT_BREAKER_OPEN_TIMEOUT_MS: number;
  EMAIL_CHANNEL_ENABLED: boolean;
  SMS_CHANNEL_ENABLED: boolean;
  SMS_SIMULATE_FAILURE: boolean;
}

const channelsConfigSchema = Joi.object<ValidatedChannelsEnv>({
  CIRCUIT_BREAKER_ENABLED: Joi.boolean().default(true),
  CIRCUIT_BREAKER_FAILURE_THRESHOLD: Joi.number()
    .integer()
    .min(1)
    .max(100)
    .default(APP_CONSTANTS.CIRCUIT_BREAKER.DEFAULT_FAILURE_THRESHOLD),
  CIRCUIT_BREAKER_OPEN_TIMEOUT_MS: Joi.number()
    .integer()
    .min(0)
    .max(APP_CONSTANTS.CIRCUIT_BREAKER.MAX_OPEN_TIMEOUT_MS)
    .default(APP_CONSTANTS.CIRCUIT_BREAKER.DEFAULT_OPEN_TIMEOUT_MS),
  EMAIL_CHANNEL_ENABLED: Joi.boolean().default(true),
  SMS_CHANNEL_ENABLED: Joi.boolean().default(true),
  SMS_SIMULATE_FAILURE: Joi.boolean().default(false),
});

export function loadChannelsConfig(
  env: Record<string, unknown>,
): ChannelsConfig {
  const validatedEnv = validateEnv(channelsConfigSchema, env, 'Channels');

  return {
    circuitBreaker: {
      enabled: validatedEnv.CIRCUIT_BREAKER_ENABLED,
      failureThreshold: validatedEnv.CIRCUIT_BREAKER_FAILURE_THRESHOLD,
      openTimeoutMs: validatedEnv.CIRCUIT_BREAKER_OPEN_TIMEOUT_MS,
    },
    email: { enabled: validatedEnv.EMAIL_CHANNEL_ENABLED },
    sms: {
      enabled: validatedEnv.SMS_CHANNEL_ENABLED,
      simulateFailure: validatedEnv.SMS_SIMULATE_FAILURE,
    },
  };
}

export default registerAs('channels', () => loadChannelsConfig(process.env));
