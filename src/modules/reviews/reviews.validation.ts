import { z } from 'zod';
import { positiveIntSchema } from '../../utils/validation';

export const reviewCreateSchema = z.object({
  product_id: positiveIntSchema,
  title: z.string().min(10, 'Title must be at least 10 characters').max(120),
  description: z.string().min(20, 'Description must be at least 20 characters').max(300),
  author_name: z.string().min(1, 'Author name is required').max(100),
  score: z.number().int().min(1).max(5),
});

export type ReviewCreateBody = z.infer<typeof reviewCreateSchema>;
