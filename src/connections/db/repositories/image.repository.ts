import { Queryable } from '../connection';
import { CreateProductImageInput, ProductImage } from '../models';
import { ImageRepository } from './types';

const IMAGE_COLUMNS = 'id, product_id, color, image_url';

export class PgImageRepository implements ImageRepository {
  constructor(private readonly db: Queryable) {}

  async findByProductIds(productIds: number[]): Promise<ProductImage[]> {
    if (productIds.length === 0) {
      return [];
    }
    const result = await this.db.query<ProductImage>(
      `SELECT ${IMAGE_COLUMNS} FROM product_images WHERE product_id = ANY($1::int[]) ORDER BY id`,
      [productIds]
    );
    return result.rows;
  }

  async create(input: CreateProductImageInput): Promise<ProductImage> {
    const result = await this.db.query<ProductImage>(
      `INSERT INTO product_images (product_id, color, image_url)
       VALUES ($1, $2, $3)
       RETURNING ${IMAGE_COLUMNS}`,
      [input.product_id, input.color, input.image_url]
    );
    return result.rows[0];
  }

  async deleteForProduct(productId: number, imageId: number): Promise<boolean> {
    const result = await this.db.query(
      'DELETE FROM product_images WHERE id = $1 AND product_id = $2 RETURNING id',
      [imageId, productId]
    );
    return result.rows.length > 0;
  }

  async deleteByProductId(productId: number): Promise<number> {
    const result = await this.db.query('DELETE FROM product_images WHERE product_id = $1', [productId]);
    return result.rowCount ?? 0;
  }
}
