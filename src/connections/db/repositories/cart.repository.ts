import { Queryable } from '../connection';
import { Cart } from '../models';
import { CartRepository } from './types';

export class PgCartRepository implements CartRepository {
  constructor(private readonly db: Queryable) {}

  async findBySessionId(sessionId: string): Promise<Cart | null> {
    const result = await this.db.query<Cart>(
      'SELECT id, session_id, created_at FROM carts WHERE session_id = $1',
      [sessionId]
    );
    return result.rows[0] ?? null;
  }

  async create(sessionId: string): Promise<Cart> {
    const result = await this.db.query<Cart>(
      'INSERT INTO carts (session_id) VALUES ($1) RETURNING id, session_id, created_at',
      [sessionId]
    );
    return result.rows[0];
  }
}
