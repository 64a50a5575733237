import * as Joi from 'joi';

/**
 * Raised at startup when a config area's environment does not validate.
 * `issues` holds one Joi message per offending variable.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly area: string,
    public readonly issues: readonly string[],
  ) {
    super(`${area} configuration validation failed: ${issues.join(', ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validate and coerce one config area's slice of the environment.
 * Unknown variables are ignored; every problem is reported, not just the first.
 */
export function validateEnv<T>(
  schema: Joi.ObjectSchema<T>,
  env: Record<string, unknown>,
  area: string,
): T {
  const { error, value } = schema.validate(env, {
    allowUnknown: true,
    abortEarly: false,
  });

  if (error) {
    throw new ConfigValidationError(
      area,
      error.details.map(({ message }) => message),
    );
  }

  return value;
}
