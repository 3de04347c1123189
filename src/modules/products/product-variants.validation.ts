import { z } from 'zod';
import { SIZES } from '../../connections/db/models';
import { hasAtLeastOneField, idSchema } from '../../utils/validation';

export const sizeSchema = z.enum(SIZES, {
  errorMap: () => ({ message: `Size must be one of ${SIZES.join(', ')}` }),
});

export const variantParamsSchema = z.object({
  variant_id: idSchema,
});

export const variantCreateSchema = z.object({
  color: z.string().min(1, 'Color is required').max(50),
  size: sizeSchema,
  in_stock: z.boolean().default(false),
});

export const variantUpdateSchema = z
  .object({
    color: z.string().min(1, 'Color is required').max(50).optional(),
    size: sizeSchema.optional(),
    in_stock: z.boolean().optional(),
  })
  .refine(hasAtLeastOneField, 'At least one field must be provided');

export type VariantCreateBody = z.infer<typeof variantCreateSchema>;
export type VariantUpdateBody = z.infer<typeof variantUpdateSchema>;
