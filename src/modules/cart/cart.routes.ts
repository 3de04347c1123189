import express from 'express';
import { DataStore } from '../../connections/db/repositories/types';
import { createCartController } from './cart.controller';
import { CartService } from './cart.service';

export const createCartRouter = (store: DataStore) => {
  const router = express.Router();
  const cartController = createCartController(new CartService(store));

  router.post('/', cartController.createCart);
  router.get('/:session_id', cartController.getCart);
  router.delete('/:session_id', cartController.clearCart);

  router.post('/:session_id/items', cartController.addItem);
  router.put('/:session_id/items/:item_id', cartController.updateItem);
  router.delete('/:session_id/items/:item_id', cartController.deleteItem);

  return router;
};
