import { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import { ProductImagesService } from './product-images.service';
import { productParamsSchema } from './products.validation';
import { imageParamsSchema, imagesCreateSchema } from './product-images.validation';

export const createImagesController = (images: ProductImagesService) => ({
  addImages: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productParamsSchema.parse(req.params);
      const validated = imagesCreateSchema.parse(req.body);
      const created = await images.add(id, validated);
      return ResponseHandler.created(res, created, `${created.length} image(s) added successfully`);
    } catch (error) {
      next(error);
    }
  },

  deleteImage: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, image_id } = imageParamsSchema.parse(req.params);
      await images.delete(id, image_id);
      return ResponseHandler.success(res, { id: image_id }, 'Image deleted');
    } catch (error) {
      next(error);
    }
  },
});
