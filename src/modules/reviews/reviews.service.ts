import { DataStore } from '../../connections/db/repositories/types';
import { ProductReview } from '../../connections/db/models';
import { assertProductExists } from '../products/products.service';
import { ReviewCreateBody } from './reviews.validation';

export class ReviewsService {
  constructor(private readonly store: DataStore) {}

  async list(skip: number, limit: number): Promise<ProductReview[]> {
    return this.store.repositories.reviews.list(skip, limit);
  }

  async create(input: ReviewCreateBody): Promise<ProductReview> {
    const { repositories } = this.store;
    await assertProductExists(repositories, input.product_id);
    return repositories.reviews.create(input);
  }
}
