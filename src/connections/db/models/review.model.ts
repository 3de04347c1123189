// ProductReview Model

export type ProductReview = {
  id: number;
  product_id: number; // ON DELETE CASCADE
  title: string; // 10-120 chars
  description: string; // 20-300 chars
  author_name: string;
  score: number; // 1-5
  created_at: Date;
};

export type CreateProductReviewInput = {
  product_id: number;
  title: string;
  description: string;
  author_name: string;
  score: number;
};
