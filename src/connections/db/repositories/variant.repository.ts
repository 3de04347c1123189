import { Queryable } from '../connection';
import { CreateProductVariantInput, ProductVariant, Size, UpdateProductVariantInput } from '../models';
import { VariantRepository } from './types';

const VARIANT_COLUMNS = 'id, product_id, color, size, in_stock';

export class PgVariantRepository implements VariantRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: number): Promise<ProductVariant | null> {
    const result = await this.db.query<ProductVariant>(
      `SELECT ${VARIANT_COLUMNS} FROM product_variants WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findByProductIds(productIds: number[]): Promise<ProductVariant[]> {
    if (productIds.length === 0) {
      return [];
    }
    const result = await this.db.query<ProductVariant>(
      `SELECT ${VARIANT_COLUMNS} FROM product_variants WHERE product_id = ANY($1::int[]) ORDER BY id`,
      [productIds]
    );
    return result.rows;
  }

  async findByColorAndSize(productId: number, color: string, size: Size): Promise<ProductVariant | null> {
    const result = await this.db.query<ProductVariant>(
      `SELECT ${VARIANT_COLUMNS} FROM product_variants WHERE product_id = $1 AND color = $2 AND size = $3`,
      [productId, color, size]
    );
    return result.rows[0] ?? null;
  }

  async create(input: CreateProductVariantInput): Promise<ProductVariant> {
    const result = await this.db.query<ProductVariant>(
      `INSERT INTO product_variants (product_id, color, size, in_stock)
       VALUES ($1, $2, $3, $4)
       RETURNING ${VARIANT_COLUMNS}`,
      [input.product_id, input.color, input.size, input.in_stock]
    );
    return result.rows[0];
  }

  async update(id: number, patch: UpdateProductVariantInput): Promise<ProductVariant | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramCount = 0;

    if (patch.color !== undefined) {
      paramCount++;
      updates.push(`color = $${paramCount}`);
      values.push(patch.color);
    }

    if (patch.size !== undefined) {
      paramCount++;
      updates.push(`size = $${paramCount}`);
      values.push(patch.size);
    }

    if (patch.in_stock !== undefined) {
      paramCount++;
      updates.push(`in_stock = $${paramCount}`);
      values.push(patch.in_stock);
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    paramCount++;
    values.push(id);

    const result = await this.db.query<ProductVariant>(
      `UPDATE product_variants SET ${updates.join(', ')} WHERE id = $${paramCount} RETURNING ${VARIANT_COLUMNS}`,
      values
    );
    return result.rows[0] ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM product_variants WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }

  async deleteByProductId(productId: number): Promise<number> {
    const result = await this.db.query('DELETE FROM product_variants WHERE product_id = $1', [productId]);
    return result.rowCount ?? 0;
  }
}
