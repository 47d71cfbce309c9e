/**
 * Configuration Validation
 *
 * Parses option objects with their Zod schema and reports failures as
 * BvhConfigError.
 */

import { ZodError, ZodTypeAny, z } from 'zod';
import { ERROR_MESSAGES } from './constants/errors';
import { BvhErrorFactory } from './errors';

/**
 * Validates `input` against `schema`, filling in defaults.
 *
 * @throws BvhConfigError listing every failing field
 */
export function validateConfig<TSchema extends ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  configKey: string
): z.infer<TSchema> {
  try {
    return schema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw BvhErrorFactory.configError(`${ERROR_MESSAGES.INVALID_CONFIG}: ${details}`, configKey, error);
    }
    throw error;
  }
}
