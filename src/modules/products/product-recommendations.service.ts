import { DataStore } from '../../connections/db/repositories/types';
import { ProductRecommendation, ProductRecommendationWithProduct } from '../../connections/db/models';
import { BadRequestError, ConflictError, NotFoundError } from '../../utils/errors';
import { assertProductExists } from './products.service';

export class ProductRecommendationsService {
  constructor(private readonly store: DataStore) {}

  async add(productId: number, recommendedId: number): Promise<ProductRecommendation> {
    if (productId === recommendedId) {
      throw new BadRequestError('A product cannot recommend itself');
    }

    const { repositories } = this.store;
    await assertProductExists(repositories, productId);
    await assertProductExists(repositories, recommendedId);

    const existing = await repositories.recommendations.findByPair(productId, recommendedId);
    if (existing) {
      throw new ConflictError('Recommendation already exists');
    }

    return repositories.recommendations.create(productId, recommendedId);
  }

  async list(productId: number): Promise<ProductRecommendationWithProduct[]> {
    const { repositories } = this.store;
    await assertProductExists(repositories, productId);
    return repositories.recommendations.listForProduct(productId);
  }

  async delete(recommendationId: number): Promise<void> {
    const deleted = await this.store.repositories.recommendations.delete(recommendationId);
    if (!deleted) {
      throw new NotFoundError('Recommendation not found');
    }
  }
}
