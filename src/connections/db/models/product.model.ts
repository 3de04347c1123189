// Product Model

import { ProductImage } from './product-image.model';
import { ProductVariant } from './product-variant.model';

export type Product = {
  id: number;
  name: string; // 1-120 chars
  price: number; // NUMERIC(10,2), returned by pg as string and mapped to number
  description: string;
  lifetime_guarantee: boolean; // default: true
  created_at: Date;
};

export type ProductWithRelations = Product & {
  variants: ProductVariant[];
  images: ProductImage[];
};

export type CreateProductInput = {
  name: string;
  price: number;
  description: string;
  lifetime_guarantee: boolean;
};

export type UpdateProductInput = {
  name?: string;
  price?: number;
  description?: string;
  lifetime_guarantee?: boolean;
};
