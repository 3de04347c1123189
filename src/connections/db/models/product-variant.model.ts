// ProductVariant Model

export const SIZES = ['XS', 'S', 'M', 'L', 'XL', 'XXL'] as const;

export type Size = (typeof SIZES)[number];

export type ProductVariant = {
  id: number;
  product_id: number; // ON DELETE CASCADE
  color: string;
  size: Size;
  in_stock: boolean; // default: false
};

export type CreateProductVariantInput = {
  product_id: number;
  color: string;
  size: Size;
  in_stock: boolean;
};

export type UpdateProductVariantInput = {
  color?: string;
  size?: Size;
  in_stock?: boolean;
};
