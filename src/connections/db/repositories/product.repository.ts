import { Queryable } from '../connection';
import { CreateProductInput, Product, UpdateProductInput } from '../models';
import { ProductRepository } from './types';

type ProductRow = {
  id: number;
  name: string;
  price: string;
  description: string;
  lifetime_guarantee: boolean;
  created_at: Date;
};

const PRODUCT_COLUMNS = 'id, name, price, description, lifetime_guarantee, created_at';

const toProduct = (row: ProductRow): Product => ({
  ...row,
  price: Number(row.price),
});

export class PgProductRepository implements ProductRepository {
  constructor(private readonly db: Queryable) {}

  async list(skip: number, limit: number): Promise<Product[]> {
    const result = await this.db.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products ORDER BY id LIMIT $1 OFFSET $2`,
      [limit, skip]
    );
    return result.rows.map(toProduct);
  }

  async findById(id: number): Promise<Product | null> {
    const result = await this.db.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toProduct(result.rows[0]) : null;
  }

  async create(input: CreateProductInput): Promise<Product> {
    const result = await this.db.query<ProductRow>(
      `INSERT INTO products (name, price, description, lifetime_guarantee)
       VALUES ($1, $2, $3, $4)
       RETURNING ${PRODUCT_COLUMNS}`,
      [input.name, input.price, input.description, input.lifetime_guarantee]
    );
    return toProduct(result.rows[0]);
  }

  async update(id: number, patch: UpdateProductInput): Promise<Product | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramCount = 0;

    if (patch.name !== undefined) {
      paramCount++;
      updates.push(`name = $${paramCount}`);
      values.push(patch.name);
    }

    if (patch.price !== undefined) {
      paramCount++;
      updates.push(`price = $${paramCount}`);
      values.push(patch.price);
    }

    if (patch.description !== undefined) {
      paramCount++;
      updates.push(`description = $${paramCount}`);
      values.push(patch.description);
    }

    if (patch.lifetime_guarantee !== undefined) {
      paramCount++;
      updates.push(`lifetime_guarantee = $${paramCount}`);
      values.push(patch.lifetime_guarantee);
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    paramCount++;
    values.push(id);

    const result = await this.db.query<ProductRow>(
      `UPDATE products SET ${updates.join(', ')} WHERE id = $${paramCount} RETURNING ${PRODUCT_COLUMNS}`,
      values
    );
    return result.rows.length > 0 ? toProduct(result.rows[0]) : null;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM products WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }
}
