import { z, type ZodTypeAny } from 'zod';
import { ValidationError } from '../shared/errors';

export function parseInput<S extends ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error);
  }
  return parsed.data;
}

export const requiredString = () =>
  z
    .string({ required_error: 'This field is required.', invalid_type_error: 'Not a valid string.' })
    .trim()
    .min(1, 'This field may not be blank.');

export const optionalText = (max: number) =>
  z.string({ invalid_type_error: 'Not a valid string.' }).max(max, `Ensure this field has no more than ${max} characters.`);

export const password = () =>
  z
    .string({ required_error: 'This field is required.', invalid_type_error: 'Not a valid string.' })
    .min(8, 'Password must be at least 8 characters long.');

export const isoDateTime = () =>
  z
    .string({ required_error: 'This field is required.', invalid_type_error: 'Not a valid string.' })
    .datetime({ offset: true, message: 'Enter a valid ISO-8601 date/time.' })
    .transform(value => new Date(value).getTime());
