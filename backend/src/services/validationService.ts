import Joi from 'joi';
import { isValidSnowflake } from '../../../shared/src/utils';

export interface SessionParams {
  userId: string;
  secondaryId: string;
}

export const sessionParamsSchema = Joi.object<SessionParams>({
  userId: Joi.string()
    .custom((value: string, helpers) => (isValidSnowflake(value) ? value : helpers.error('any.invalid')))
    .required(),
  secondaryId: Joi.string()
    .guid({ version: ['uuidv4'] })
    .required()
    .messages({
      'string.guid': 'secondaryId must be a valid UUID',
    }),
});

export const emailSchema = Joi.string()
  .trim()
  .lowercase()
  .email({ tlds: { allow: false } })
  .max(254)
  .required();

// Six digits, or the fixed testing code
export const codeSchema = Joi.string()
  .trim()
  .pattern(/^-?\d{1,10}$/)
  .required();

/**
 * Validates route parameters. Anything invalid is treated as an unknown
 * session.
 */
export function validateSessionParams(params: unknown): SessionParams | null {
  const { error, value } = sessionParamsSchema.validate(params, { allowUnknown: false, stripUnknown: true });
  if (error) {
    return null;
  }
  return value;
}

export function validateEmail(input: unknown): string | null {
  const { error, value } = emailSchema.validate(input);
  return error ? null : value;
}

export function validateCode(input: unknown): string | null {
  const { error, value } = codeSchema.validate(input);
  return error ? null : value;
}
