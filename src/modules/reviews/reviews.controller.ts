import { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import { paginationSchema } from '../../utils/validation';
import { ReviewsService } from './reviews.service';
import { reviewCreateSchema } from './reviews.validation';

export const createReviewsController = (reviews: ReviewsService) => ({
  getReviews: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { skip, limit } = paginationSchema.parse(req.query);
      const data = await reviews.list(skip, limit);
      return ResponseHandler.list(res, data, { skip, limit }, 'Reviews retrieved successfully');
    } catch (error) {
      next(error);
    }
  },

  createReview: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validated = reviewCreateSchema.parse(req.body);
      const review = await reviews.create(validated);
      return ResponseHandler.created(res, review, 'Review created successfully');
    } catch (error) {
      next(error);
    }
  },
});
