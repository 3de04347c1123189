import { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import { CartService } from './cart.service';
import {
  cartCreateSchema,
  cartItemCreateSchema,
  cartItemParamsSchema,
  cartItemUpdateSchema,
  cartParamsSchema,
} from './cart.validation';

export const createCartController = (carts: CartService) => ({
  // Idempotent per session_id: 201 when created, 200 when it already existed
  createCart: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { session_id } = cartCreateSchema.parse(req.body);
      const { cart, created } = await carts.create(session_id);
      return created
        ? ResponseHandler.created(res, cart, 'Cart created successfully')
        : ResponseHandler.success(res, cart, 'Cart already exists');
    } catch (error) {
      next(error);
    }
  },

  getCart: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { session_id } = cartParamsSchema.parse(req.params);
      const cart = await carts.get(session_id);
      return ResponseHandler.success(res, cart, 'Cart retrieved successfully');
    } catch (error) {
      next(error);
    }
  },

  clearCart: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { session_id } = cartParamsSchema.parse(req.params);
      const cart = await carts.clear(session_id);
      return ResponseHandler.success(res, cart, 'Cart cleared');
    } catch (error) {
      next(error);
    }
  },

  addItem: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { session_id } = cartParamsSchema.parse(req.params);
      const validated = cartItemCreateSchema.parse(req.body);
      const item = await carts.addItem(session_id, validated);
      return ResponseHandler.created(res, item, 'Item added to cart');
    } catch (error) {
      next(error);
    }
  },

  updateItem: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { session_id, item_id } = cartItemParamsSchema.parse(req.params);
      const { quantity } = cartItemUpdateSchema.parse(req.body);
      const item = await carts.updateItem(session_id, item_id, quantity);
      return ResponseHandler.success(res, item, 'Cart item updated');
    } catch (error) {
      next(error);
    }
  },

  deleteItem: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { session_id, item_id } = cartItemParamsSchema.parse(req.params);
      await carts.deleteItem(session_id, item_id);
      return ResponseHandler.success(res, { id: item_id }, 'Cart item deleted');
    } catch (error) {
      next(error);
    }
  },
});
