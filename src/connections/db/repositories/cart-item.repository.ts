import { Queryable } from '../connection';
import { CartItem, CreateCartItemInput } from '../models';
import { CartItemRepository } from './types';

const CART_ITEM_COLUMNS = 'id, cart_id, variant_id, quantity';

export class PgCartItemRepository implements CartItemRepository {
  constructor(private readonly db: Queryable) {}

  async findByCartId(cartId: number): Promise<CartItem[]> {
    const result = await this.db.query<CartItem>(
      `SELECT ${CART_ITEM_COLUMNS} FROM cart_items WHERE cart_id = $1 ORDER BY id`,
      [cartId]
    );
    return result.rows;
  }

  async findInCart(cartId: number, itemId: number): Promise<CartItem | null> {
    const result = await this.db.query<CartItem>(
      `SELECT ${CART_ITEM_COLUMNS} FROM cart_items WHERE id = $1 AND cart_id = $2`,
      [itemId, cartId]
    );
    return result.rows[0] ?? null;
  }

  async findByCartAndVariant(cartId: number, variantId: number): Promise<CartItem | null> {
    const result = await this.db.query<CartItem>(
      `SELECT ${CART_ITEM_COLUMNS} FROM cart_items WHERE cart_id = $1 AND variant_id = $2`,
      [cartId, variantId]
    );
    return result.rows[0] ?? null;
  }

  async create(input: CreateCartItemInput): Promise<CartItem> {
    const result = await this.db.query<CartItem>(
      `INSERT INTO cart_items (cart_id, variant_id, quantity)
       VALUES ($1, $2, $3)
       RETURNING ${CART_ITEM_COLUMNS}`,
      [input.cart_id, input.variant_id, input.quantity]
    );
    return result.rows[0];
  }

  async updateQuantity(id: number, quantity: number): Promise<CartItem | null> {
    const result = await this.db.query<CartItem>(
      `UPDATE cart_items SET quantity = $1 WHERE id = $2 RETURNING ${CART_ITEM_COLUMNS}`,
      [quantity, id]
    );
    return result.rows[0] ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM cart_items WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }

  async deleteByCartId(cartId: number): Promise<number> {
    const result = await this.db.query('DELETE FROM cart_items WHERE cart_id = $1', [cartId]);
    return result.rowCount ?? 0;
  }

  async deleteByVariantIds(variantIds: number[]): Promise<number> {
    if (variantIds.length === 0) {
      return 0;
    }
    const result = await this.db.query('DELETE FROM cart_items WHERE variant_id = ANY($1::int[])', [variantIds]);
    return result.rowCount ?? 0;
  }
}
