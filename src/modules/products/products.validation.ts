import { z } from 'zod';
import { hasAtLeastOneField, idSchema, MAX_PRICE } from '../../utils/validation';
import { imageCreateSchema } from './product-images.validation';
import { variantCreateSchema } from './product-variants.validation';

const priceSchema = z
  .number()
  .positive('Price must be greater than 0')
  .max(MAX_PRICE, `Price must be at most ${MAX_PRICE}`)
  .multipleOf(0.01, 'Price must have at most 2 decimal places');

export const productParamsSchema = z.object({
  id: idSchema,
});

export const productCreateSchema = z.object({
  name: z.string().min(1, 'Product name is required').max(120, 'Product name must be at most 120 characters'),
  price: priceSchema,
  description: z.string().min(1, 'Description is required'),
  lifetime_guarantee: z.boolean().default(true),
  variants: z.array(variantCreateSchema).default([]),
  images: z.array(imageCreateSchema).default([]),
});

export const productUpdateSchema = z
  .object({
    name: z.string().min(1, 'Product name is required').max(120, 'Product name must be at most 120 characters').optional(),
    price: priceSchema.optional(),
    description: z.string().min(1, 'Description is required').optional(),
    lifetime_guarantee: z.boolean().optional(),
  })
  .refine(hasAtLeastOneField, 'At least one field must be provided');

export type ProductCreateBody = z.infer<typeof productCreateSchema>;
export type ProductUpdateBody = z.infer<typeof productUpdateSchema>;
