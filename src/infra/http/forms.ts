import { z } from 'zod';
import { MAX_RATING, MIN_RATING } from '../../domain/cafes/cafe.js';
import { NotFoundError } from '../../application/errors.js';

/** First message per field, keyed by field name. */
export type FormErrors = Partial<Record<string, string>>;

export type FormResult<T> =
  | { success: true; data: T }
  | { success: false; errors: FormErrors };

const RATING_MESSAGE = `Rating must be between ${MIN_RATING} and ${MAX_RATING}.`;

function requiredText(label: string) {
  return z
    .string({ required_error: `${label} is required.` })
    .trim()
    .min(1, `${label} is required.`);
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const optionalUrl = optionalText.pipe(
  z
    .string()
    .url('Enter a valid URL.')
    .regex(/^https?:\/\//i, 'Enter a valid URL.')
    .optional()
);

const email = requiredText('Email').email('Enter a valid email address.');

export const registerFormSchema = z.object({
  email,
  password: z.string({ required_error: 'Password is required.' }).min(1, 'Password is required.'),
  name: requiredText('Name'),
});

export const loginFormSchema = z.object({
  email,
  password: z.string({ required_error: 'Password is required.' }).min(1, 'Password is required.'),
});

export const cafeFormSchema = z.object({
  name: requiredText('Cafe name'),
  summary: requiredText('Summary'),
  rating: z.coerce
    .number({ invalid_type_error: RATING_MESSAGE })
    .int(RATING_MESSAGE)
    .min(MIN_RATING, RATING_MESSAGE)
    .max(MAX_RATING, RATING_MESSAGE),
  body: requiredText('Review'),
  imgUrl: optionalUrl,
  contributorName: optionalText,
});

export const commentFormSchema = z.object({
  text: requiredText('Comment'),
});

export const contactFormSchema = z.object({
  name: requiredText('Name'),
  email,
  phone: z.string().trim().default(''),
  message: requiredText('Message'),
});

export function parseForm<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown
): FormResult<T> {
  const result = schema.safeParse(body);
  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors: FormErrors = {};
  for (const issue of result.error.issues) {
    const field = issue.path.join('.');
    if (errors[field] === undefined) {
      errors[field] = issue.message;
    }
  }
  return { success: false, errors };
}

/**
 * Submitted values to refill a form with after a failed validation.
 * Fields not listed (passwords) are never echoed back.
 */
export function echoValues(body: unknown, fields: readonly string[]): Record<string, string> {
  const values: Record<string, string> = {};
  if (body === null || typeof body !== 'object') {
    return values;
  }
  for (const [key, value] of Object.entries(body)) {
    if (fields.includes(key) && typeof value === 'string') {
      values[key] = value;
    }
  }
  return values;
}

/** Largest value a SERIAL column hands out. */
export const MAX_SERIAL_ID = 2147483647;

const idParamSchema = z.coerce.number().int().positive().max(MAX_SERIAL_ID);

/**
 * Route ids that are not positive integers match no cafe.
 */
export function parseId(raw: string): number {
  const result = idParamSchema.safeParse(raw);
  if (!result.success) {
    throw new NotFoundError('Cafe not found');
  }
  return result.data;
}
