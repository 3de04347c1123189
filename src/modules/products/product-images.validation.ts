import { z } from 'zod';
import { idSchema } from '../../utils/validation';

export const imageParamsSchema = z.object({
  id: idSchema,
  image_id: idSchema,
});

export const imageCreateSchema = z.object({
  color: z.string().max(50).nullable().optional(),
  image_url: z.string().min(1, 'Image URL is required').max(255),
});

export const imagesCreateSchema = z.array(imageCreateSchema).min(1, 'No images provided');

export type ImageCreateBody = z.infer<typeof imageCreateSchema>;
