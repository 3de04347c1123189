import { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import { ProductVariantsService } from './product-variants.service';
import { productParamsSchema } from './products.validation';
import { variantCreateSchema, variantParamsSchema, variantUpdateSchema } from './product-variants.validation';

export const createVariantsController = (variants: ProductVariantsService) => ({
  createVariant: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productParamsSchema.parse(req.params);
      const validated = variantCreateSchema.parse(req.body);
      const variant = await variants.add(id, validated);
      return ResponseHandler.created(res, variant, 'Variant created successfully');
    } catch (error) {
      next(error);
    }
  },

  updateVariant: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { variant_id } = variantParamsSchema.parse(req.params);
      const validated = variantUpdateSchema.parse(req.body);
      const variant = await variants.update(variant_id, validated);
      return ResponseHandler.success(res, variant, 'Variant updated successfully');
    } catch (error) {
      next(error);
    }
  },

  deleteVariant: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { variant_id } = variantParamsSchema.parse(req.params);
      await variants.delete(variant_id);
      return ResponseHandler.success(res, { id: variant_id }, 'Variant deleted');
    } catch (error) {
      next(error);
    }
  },
});
