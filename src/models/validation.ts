import { z } from 'zod';
import { ValidationError } from '../types/error.types';

/**
 * Parse entity input, raising ValidationError with per-field messages on failure
 */
export const parseEntityInput = <S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  entity: string
): z.output<S> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    const errors = result.error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message,
    }));
    const first = errors[0];
    const summary = first ? `${first.field ? `${first.field}: ` : ''}${first.message}` : 'invalid input';
    throw new ValidationError(`Invalid ${entity}: ${summary}`, { errors });
  }

  return result.data;
};

export const requiredText = (label: string) =>
  z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a string` })
    .trim()
    .min(1, `${label} cannot be empty`);

export const optionalText = () =>
  z
    .string()
    .trim()
    .nullish()
    .transform((val) => (val ? val : null));

export const identifier = (label: string) => requiredText(label).max(255, `${label} must be at most 255 characters`);
