// ProductRecommendation Model - directed edge base_product -> recommended_product

import { Product } from './product.model';

export type ProductRecommendation = {
  id: number;
  base_product_id: number;
  recommended_product_id: number;
};

export type ProductRecommendationWithProduct = ProductRecommendation & {
  recommended_product: Omit<Product, 'created_at'>;
};
