import { Queryable } from '../connection';
import { CreateProductReviewInput, ProductReview } from '../models';
import { ReviewRepository } from './types';

const REVIEW_COLUMNS = 'id, product_id, title, description, author_name, score, created_at';

export class PgReviewRepository implements ReviewRepository {
  constructor(private readonly db: Queryable) {}

  async list(skip: number, limit: number): Promise<ProductReview[]> {
    const result = await this.db.query<ProductReview>(
      `SELECT ${REVIEW_COLUMNS} FROM product_reviews ORDER BY id LIMIT $1 OFFSET $2`,
      [limit, skip]
    );
    return result.rows;
  }

  async create(input: CreateProductReviewInput): Promise<ProductReview> {
    const result = await this.db.query<ProductReview>(
      `INSERT INTO product_reviews (product_id, title, description, author_name, score)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${REVIEW_COLUMNS}`,
      [input.product_id, input.title, input.description, input.author_name, input.score]
    );
    return result.rows[0];
  }

  async deleteByProductId(productId: number): Promise<number> {
    const result = await this.db.query('DELETE FROM product_reviews WHERE product_id = $1', [productId]);
    return result.rowCount ?? 0;
  }
}
