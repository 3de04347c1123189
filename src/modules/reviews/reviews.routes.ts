import express from 'express';
import { DataStore } from '../../connections/db/repositories/types';
import { createReviewsController } from './reviews.controller';
import { ReviewsService } from './reviews.service';

export const createReviewsRouter = (store: DataStore) => {
  const router = express.Router();
  const reviewsController = createReviewsController(new ReviewsService(store));

  router.get('/', reviewsController.getReviews);
  router.post('/', reviewsController.createReview);

  return router;
};
