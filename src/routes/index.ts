import express from 'express';
import { DataStore } from '../connections/db/repositories/types';
import { createProductsRouter } from '../modules/products/products.routes';
import { createCartRouter } from '../modules/cart/cart.routes';
import { createReviewsRouter } from '../modules/reviews/reviews.routes';

export const createApiRouter = (store: DataStore) => {
  const router = express.Router();

  router.use('/product', createProductsRouter(store));
  router.use('/cart', createCartRouter(store));
  router.use('/review', createReviewsRouter(store));

  return router;
};
