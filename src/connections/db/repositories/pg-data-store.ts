import { Pool } from 'pg';
import { fromClient, fromPool, Queryable, withTransaction } from '../connection';
import { PgCartItemRepository } from './cart-item.repository';
import { PgCartRepository } from './cart.repository';
import { PgImageRepository } from './image.repository';
import { PgProductRepository } from './product.repository';
import { PgRecommendationRepository } from './recommendation.repository';
import { PgReviewRepository } from './review.repository';
import { DataStore, Repositories } from './types';
import { PgVariantRepository } from './variant.repository';

const buildRepositories = (db: Queryable): Repositories => ({
  products: new PgProductRepository(db),
  variants: new PgVariantRepository(db),
  images: new PgImageRepository(db),
  recommendations: new PgRecommendationRepository(db),
  carts: new PgCartRepository(db),
  cartItems: new PgCartItemRepository(db),
  reviews: new PgReviewRepository(db),
});

export class PgDataStore implements DataStore {
  readonly repositories: Repositories;

  constructor(private readonly source: Pool) {
    this.repositories = buildRepositories(fromPool(source));
  }

  transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T> {
    return withTransaction(client => work(buildRepositories(fromClient(client))), this.source);
  }

  async ping(): Promise<void> {
    await this.source.query('SELECT 1');
  }
}
