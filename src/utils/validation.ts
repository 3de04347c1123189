import { z, ZodError } from 'zod';
import { paginationConfig } from '../connections/config/app.config';
import { FieldError } from './errors';

// Upper bound of a Postgres INTEGER column
export const MAX_INT = 2147483647;

// Largest value a NUMERIC(10,2) column holds
export const MAX_PRICE = 99999999.99;

export const positiveIntSchema = z.number().int().positive().max(MAX_INT);

// Path ids arrive as strings
export const idSchema = z.coerce.number().int().positive().max(MAX_INT);

export const paginationSchema = z.object({
  skip: z.coerce.number().int().nonnegative().max(MAX_INT).default(paginationConfig.defaultSkip),
  limit: z.coerce
    .number()
    .int()
    .positive()
    .max(paginationConfig.maxLimit)
    .default(paginationConfig.defaultLimit),
});

export type Pagination = z.infer<typeof paginationSchema>;

export const toFieldErrors = (error: ZodError): FieldError[] =>
  error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

export const hasAtLeastOneField = (data: Record<string, unknown>): boolean =>
  Object.values(data).some(value => value !== undefined);
