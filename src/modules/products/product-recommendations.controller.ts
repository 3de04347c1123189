import { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import { ProductRecommendationsService } from './product-recommendations.service';
import { productParamsSchema } from './products.validation';
import { addRecommendationParamsSchema, recommendationParamsSchema } from './product-recommendations.validation';

export const createRecommendationsController = (recommendations: ProductRecommendationsService) => ({
  addRecommendation: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, rec_id } = addRecommendationParamsSchema.parse(req.params);
      const recommendation = await recommendations.add(id, rec_id);
      return ResponseHandler.created(res, recommendation, 'Recommendation added');
    } catch (error) {
      next(error);
    }
  },

  getRecommendations: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productParamsSchema.parse(req.params);
      const data = await recommendations.list(id);
      return ResponseHandler.success(res, data, 'Recommendations retrieved successfully');
    } catch (error) {
      next(error);
    }
  },

  // rec_id here is the recommendation's own id, not a product id
  deleteRecommendation: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { rec_id } = recommendationParamsSchema.parse(req.params);
      await recommendations.delete(rec_id);
      return ResponseHandler.success(res, { id: rec_id }, 'Recommendation deleted');
    } catch (error) {
      next(error);
    }
  },
});
