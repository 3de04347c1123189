import { InMemoryDataStore } from '../../../../test/support/in-memory-data-store';
import { NotFoundError } from '../../../utils/errors';
import { ProductsService } from '../../products/products.service';
import { ReviewsService } from '../reviews.service';
import { ReviewCreateBody } from '../reviews.validation';

describe('ReviewsService', () => {
  let store: InMemoryDataStore;
  let service: ReviewsService;

  const review = (productId: number, author: string): ReviewCreateBody => ({
    product_id: productId,
    title: 'Solid everyday pick',
    description: 'Comfortable and well made for the price',
    author_name: author,
    score: 4,
  });

  beforeEach(async () => {
    store = new InMemoryDataStore();
    service = new ReviewsService(store);
    await new ProductsService(store).create({
      name: 'Belt',
      price: 15,
      description: 'Leather belt',
      lifetime_guarantee: true,
      variants: [],
      images: [],
    });
  });

  it('should create a review for an existing product', async () => {
    const created = await service.create(review(1, 'Alex'));

    expect(created).toMatchObject({ id: 2, product_id: 1, author_name: 'Alex', score: 4 });
    expect(created.created_at).toBeInstanceOf(Date);
  });

  it('should reject a review for a missing product', async () => {
    await expect(service.create(review(8, 'Alex'))).rejects.toThrow(NotFoundError);
    expect(store.tables.reviews).toEqual([]);
  });

  it('should page through reviews', async () => {
    await service.create(review(1, 'Alex'));
    await service.create(review(1, 'Blair'));
    await service.create(review(1, 'Casey'));

    const page = await service.list(1, 5);

    expect(page.map(item => item.author_name)).toEqual(['Blair', 'Casey']);
  });
});
