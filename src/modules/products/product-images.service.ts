import { DataStore } from '../../connections/db/repositories/types';
import { ProductImage } from '../../connections/db/models';
import { NotFoundError } from '../../utils/errors';
import { assertProductExists } from './products.service';
import { ImageCreateBody } from './product-images.validation';

export class ProductImagesService {
  constructor(private readonly store: DataStore) {}

  async add(productId: number, images: ImageCreateBody[]): Promise<ProductImage[]> {
    return this.store.transaction(async repositories => {
      await assertProductExists(repositories, productId);

      const created: ProductImage[] = [];
      for (const image of images) {
        created.push(
          await repositories.images.create({
            product_id: productId,
            color: image.color ?? null,
            image_url: image.image_url,
          })
        );
      }
      return created;
    });
  }

  async delete(productId: number, imageId: number): Promise<void> {
    const deleted = await this.store.repositories.images.deleteForProduct(productId, imageId);
    if (!deleted) {
      throw new NotFoundError('Image not found for this product');
    }
  }
}
