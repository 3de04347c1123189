import { z } from 'zod';
import { idSchema } from '../../utils/validation';

export const addRecommendationParamsSchema = z.object({
  id: idSchema,
  rec_id: idSchema,
});

export const recommendationParamsSchema = z.object({
  rec_id: idSchema,
});
