import { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import { paginationSchema } from '../../utils/validation';
import { ProductsService } from './products.service';
import { productCreateSchema, productParamsSchema, productUpdateSchema } from './products.validation';

export const createProductsController = (products: ProductsService) => ({
  // GET /product/?skip=&limit=
  getProducts: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { skip, limit } = paginationSchema.parse(req.query);
      const data = await products.list(skip, limit);
      return ResponseHandler.list(res, data, { skip, limit }, 'Products retrieved successfully');
    } catch (error) {
      next(error);
    }
  },

  getProductById: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productParamsSchema.parse(req.params);
      const product = await products.getById(id);
      return ResponseHandler.success(res, product, 'Product retrieved successfully');
    } catch (error) {
      next(error);
    }
  },

  createProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validated = productCreateSchema.parse(req.body);
      const product = await products.create(validated);
      return ResponseHandler.created(res, product, 'Product created successfully');
    } catch (error) {
      next(error);
    }
  },

  updateProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productParamsSchema.parse(req.params);
      const validated = productUpdateSchema.parse(req.body);
      const product = await products.update(id, validated);
      return ResponseHandler.success(res, product, 'Product updated successfully');
    } catch (error) {
      next(error);
    }
  },

  deleteProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productParamsSchema.parse(req.params);
      await products.delete(id);
      return ResponseHandler.success(res, { id }, 'Product deleted');
    } catch (error) {
      next(error);
    }
  },
});
