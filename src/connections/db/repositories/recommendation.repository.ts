import { Queryable } from '../connection';
import { ProductRecommendation, ProductRecommendationWithProduct } from '../models';
import { RecommendationRepository } from './types';

type RecommendationJoinRow = ProductRecommendation & {
  name: string;
  price: string;
  description: string;
  lifetime_guarantee: boolean;
};

const RECOMMENDATION_COLUMNS = 'id, base_product_id, recommended_product_id';

export class PgRecommendationRepository implements RecommendationRepository {
  constructor(private readonly db: Queryable) {}

  async findByPair(baseProductId: number, recommendedProductId: number): Promise<ProductRecommendation | null> {
    const result = await this.db.query<ProductRecommendation>(
      `SELECT ${RECOMMENDATION_COLUMNS} FROM product_recommendations
       WHERE base_product_id = $1 AND recommended_product_id = $2`,
      [baseProductId, recommendedProductId]
    );
    return result.rows[0] ?? null;
  }

  async create(baseProductId: number, recommendedProductId: number): Promise<ProductRecommendation> {
    const result = await this.db.query<ProductRecommendation>(
      `INSERT INTO product_recommendations (base_product_id, recommended_product_id)
       VALUES ($1, $2)
       RETURNING ${RECOMMENDATION_COLUMNS}`,
      [baseProductId, recommendedProductId]
    );
    return result.rows[0];
  }

  async listForProduct(baseProductId: number): Promise<ProductRecommendationWithProduct[]> {
    const result = await this.db.query<RecommendationJoinRow>(
      `SELECT r.id, r.base_product_id, r.recommended_product_id,
              p.name, p.price, p.description, p.lifetime_guarantee
       FROM product_recommendations r
       JOIN products p ON p.id = r.recommended_product_id
       WHERE r.base_product_id = $1
       ORDER BY r.id`,
      [baseProductId]
    );

    return result.rows.map(row => ({
      id: row.id,
      base_product_id: row.base_product_id,
      recommended_product_id: row.recommended_product_id,
      recommended_product: {
        id: row.recommended_product_id,
        name: row.name,
        price: Number(row.price),
        description: row.description,
        lifetime_guarantee: row.lifetime_guarantee,
      },
    }));
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM product_recommendations WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }

  async deleteByProductId(productId: number): Promise<number> {
    const result = await this.db.query(
      'DELETE FROM product_recommendations WHERE base_product_id = $1 OR recommended_product_id = $1',
      [productId]
    );
    return result.rowCount ?? 0;
  }
}
