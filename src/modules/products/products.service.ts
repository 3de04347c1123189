import { DataStore, Repositories } from '../../connections/db/repositories/types';
import { Product, ProductWithRelations } from '../../connections/db/models';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { getLogger } from '../../utils/logging';
import { ProductCreateBody, ProductUpdateBody } from './products.validation';

const attachRelations = async (
  repositories: Repositories,
  products: Product[]
): Promise<ProductWithRelations[]> => {
  const ids = products.map(product => product.id);
  const [variants, images] = await Promise.all([
    repositories.variants.findByProductIds(ids),
    repositories.images.findByProductIds(ids),
  ]);

  return products.map(product => ({
    ...product,
    variants: variants.filter(variant => variant.product_id === product.id),
    images: images.filter(image => image.product_id === product.id),
  }));
};

export const loadProduct = async (repositories: Repositories, id: number): Promise<ProductWithRelations> => {
  const product = await repositories.products.findById(id);
  if (!product) {
    throw new NotFoundError('Product not found');
  }
  const [withRelations] = await attachRelations(repositories, [product]);
  return withRelations;
};

export const assertProductExists = async (repositories: Repositories, id: number): Promise<Product> => {
  const product = await repositories.products.findById(id);
  if (!product) {
    throw new NotFoundError('Product not found');
  }
  return product;
};

export class ProductsService {
  private readonly logger = getLogger(ProductsService.name);

  constructor(private readonly store: DataStore) {}

  async list(skip: number, limit: number): Promise<ProductWithRelations[]> {
    const products = await this.store.repositories.products.list(skip, limit);
    return attachRelations(this.store.repositories, products);
  }

  async getById(id: number): Promise<ProductWithRelations> {
    return loadProduct(this.store.repositories, id);
  }

  async create(input: ProductCreateBody): Promise<ProductWithRelations> {
    const seen = new Set<string>();
    for (const variant of input.variants) {
      const key = `${variant.color}|${variant.size}`;
      if (seen.has(key)) {
        throw new ConflictError(`Duplicate variant ${variant.color}/${variant.size}`);
      }
      seen.add(key);
    }

    const product = await this.store.transaction(async repositories => {
      const created = await repositories.products.create({
        name: input.name,
        price: input.price,
        description: input.description,
        lifetime_guarantee: input.lifetime_guarantee,
      });

      for (const variant of input.variants) {
        await repositories.variants.create({ product_id: created.id, ...variant });
      }

      for (const image of input.images) {
        await repositories.images.create({
          product_id: created.id,
          color: image.color ?? null,
          image_url: image.image_url,
        });
      }

      return loadProduct(repositories, created.id);
    });

    this.logger.info('Product created', { productId: product.id });
    return product;
  }

  async update(id: number, patch: ProductUpdateBody): Promise<ProductWithRelations> {
    const updated = await this.store.repositories.products.update(id, patch);
    if (!updated) {
      throw new NotFoundError('Product not found');
    }
    return loadProduct(this.store.repositories, id);
  }

  /**
   * Removes the product together with its variants (and the cart items holding them),
   * images, reviews and every recommendation edge touching it.
   */
  async delete(id: number): Promise<void> {
    await this.store.transaction(async repositories => {
      await assertProductExists(repositories, id);

      const variants = await repositories.variants.findByProductIds([id]);
      await repositories.cartItems.deleteByVariantIds(variants.map(variant => variant.id));
      await repositories.variants.deleteByProductId(id);
      await repositories.images.deleteByProductId(id);
      await repositories.recommendations.deleteByProductId(id);
      await repositories.reviews.deleteByProductId(id);
      await repositories.products.delete(id);
    });

    this.logger.info('Product deleted', { productId: id });
  }
}
