import { z } from 'zod';
import { idSchema, MAX_INT, positiveIntSchema } from '../../utils/validation';

const sessionIdSchema = z
  .string()
  .min(1, 'Session id is required')
  .max(128, 'Session id must be at most 128 characters');

const quantitySchema = z
  .number()
  .int()
  .positive('Quantity must be greater than 0')
  .max(MAX_INT, `Quantity must be at most ${MAX_INT}`);

export const cartCreateSchema = z.object({
  session_id: sessionIdSchema,
});

export const cartParamsSchema = z.object({
  session_id: sessionIdSchema,
});

export const cartItemParamsSchema = z.object({
  session_id: sessionIdSchema,
  item_id: idSchema,
});

export const cartItemCreateSchema = z.object({
  variant_id: positiveIntSchema,
  quantity: quantitySchema,
});

export const cartItemUpdateSchema = z.object({
  quantity: quantitySchema,
});

export type CartItemCreateBody = z.infer<typeof cartItemCreateSchema>;
