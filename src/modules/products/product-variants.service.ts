import { DataStore } from '../../connections/db/repositories/types';
import { ProductVariant } from '../../connections/db/models';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { assertProductExists } from './products.service';
import { VariantCreateBody, VariantUpdateBody } from './product-variants.validation';

export class ProductVariantsService {
  constructor(private readonly store: DataStore) {}

  async add(productId: number, input: VariantCreateBody): Promise<ProductVariant> {
    const { repositories } = this.store;
    await assertProductExists(repositories, productId);

    const existing = await repositories.variants.findByColorAndSize(productId, input.color, input.size);
    if (existing) {
      throw new ConflictError('This variant already exists for the product');
    }

    return repositories.variants.create({ product_id: productId, ...input });
  }

  async update(variantId: number, patch: VariantUpdateBody): Promise<ProductVariant> {
    const { repositories } = this.store;
    const variant = await repositories.variants.findById(variantId);
    if (!variant) {
      throw new NotFoundError('Variant not found');
    }

    if (patch.color !== undefined || patch.size !== undefined) {
      const clash = await repositories.variants.findByColorAndSize(
        variant.product_id,
        patch.color ?? variant.color,
        patch.size ?? variant.size
      );
      if (clash && clash.id !== variantId) {
        throw new ConflictError('This variant already exists for the product');
      }
    }

    const updated = await repositories.variants.update(variantId, patch);
    if (!updated) {
      throw new NotFoundError('Variant not found');
    }
    return updated;
  }

  async delete(variantId: number): Promise<void> {
    await this.store.transaction(async repositories => {
      const variant = await repositories.variants.findById(variantId);
      if (!variant) {
        throw new NotFoundError('Variant not found');
      }

      await repositories.cartItems.deleteByVariantIds([variantId]);
      await repositories.variants.delete(variantId);
    });
  }
}
