import express from 'express';
import { DataStore } from '../../connections/db/repositories/types';
import { createProductsController } from './products.controller';
import { createVariantsController } from './product-variants.controller';
import { createImagesController } from './product-images.controller';
import { createRecommendationsController } from './product-recommendations.controller';
import { ProductsService } from './products.service';
import { ProductVariantsService } from './product-variants.service';
import { ProductImagesService } from './product-images.service';
import { ProductRecommendationsService } from './product-recommendations.service';

export const createProductsRouter = (store: DataStore) => {
  const router = express.Router();
  const productsController = createProductsController(new ProductsService(store));
  const variantsController = createVariantsController(new ProductVariantsService(store));
  const imagesController = createImagesController(new ProductImagesService(store));
  const recommendationsController = createRecommendationsController(new ProductRecommendationsService(store));

  // Variants (by variant id)
  router.put('/variant/:variant_id', variantsController.updateVariant);
  router.delete('/variant/:variant_id', variantsController.deleteVariant);

  // Recommendations (by recommendation id)
  router.delete('/recommendations/:rec_id', recommendationsController.deleteRecommendation);

  // Products
  router.get('/', productsController.getProducts);
  router.post('/', productsController.createProduct);
  router.get('/:id', productsController.getProductById);
  router.put('/:id', productsController.updateProduct);
  router.delete('/:id', productsController.deleteProduct);

  // Images
  router.post('/:id/images', imagesController.addImages);
  router.delete('/:id/images/:image_id', imagesController.deleteImage);

  // Variants (under a product)
  router.post('/:id/variants', variantsController.createVariant);

  // Recommendations (under a product)
  router.post('/:id/recommendations/:rec_id', recommendationsController.addRecommendation);
  router.get('/:id/recommendations', recommendationsController.getRecommendations);

  return router;
};
