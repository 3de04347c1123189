// ProductImage Model

export type ProductImage = {
  id: number;
  product_id: number; // ON DELETE CASCADE
  color: string | null;
  image_url: string;
};

export type CreateProductImageInput = {
  product_id: number;
  color: string | null;
  image_url: string;
};
