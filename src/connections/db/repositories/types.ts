import {
  Cart,
  CartItem,
  CreateCartItemInput,
  CreateProductImageInput,
  CreateProductInput,
  CreateProductReviewInput,
  CreateProductVariantInput,
  Product,
  ProductImage,
  ProductRecommendation,
  ProductRecommendationWithProduct,
  ProductReview,
  ProductVariant,
  Size,
  UpdateProductInput,
  UpdateProductVariantInput,
} from '../models';

export interface ProductRepository {
  list(skip: number, limit: number): Promise<Product[]>;
  findById(id: number): Promise<Product | null>;
  create(input: CreateProductInput): Promise<Product>;
  update(id: number, patch: UpdateProductInput): Promise<Product | null>;
  delete(id: number): Promise<boolean>;
}

export interface VariantRepository {
  findById(id: number): Promise<ProductVariant | null>;
  findByProductIds(productIds: number[]): Promise<ProductVariant[]>;
  findByColorAndSize(productId: number, color: string, size: Size): Promise<ProductVariant | null>;
  create(input: CreateProductVariantInput): Promise<ProductVariant>;
  update(id: number, patch: UpdateProductVariantInput): Promise<ProductVariant | null>;
  delete(id: number): Promise<boolean>;
  deleteByProductId(productId: number): Promise<number>;
}

export interface ImageRepository {
  findByProductIds(productIds: number[]): Promise<ProductImage[]>;
  create(input: CreateProductImageInput): Promise<ProductImage>;
  deleteForProduct(productId: number, imageId: number): Promise<boolean>;
  deleteByProductId(productId: number): Promise<number>;
}

export interface RecommendationRepository {
  findByPair(baseProductId: number, recommendedProductId: number): Promise<ProductRecommendation | null>;
  create(baseProductId: number, recommendedProductId: number): Promise<ProductRecommendation>;
  listForProduct(baseProductId: number): Promise<ProductRecommendationWithProduct[]>;
  delete(id: number): Promise<boolean>;
  /** Removes edges on either side of the product */
  deleteByProductId(productId: number): Promise<number>;
}

export interface CartRepository {
  findBySessionId(sessionId: string): Promise<Cart | null>;
  create(sessionId: string): Promise<Cart>;
}

export interface CartItemRepository {
  findByCartId(cartId: number): Promise<CartItem[]>;
  findInCart(cartId: number, itemId: number): Promise<CartItem | null>;
  findByCartAndVariant(cartId: number, variantId: number): Promise<CartItem | null>;
  create(input: CreateCartItemInput): Promise<CartItem>;
  updateQuantity(id: number, quantity: number): Promise<CartItem | null>;
  delete(id: number): Promise<boolean>;
  deleteByCartId(cartId: number): Promise<number>;
  deleteByVariantIds(variantIds: number[]): Promise<number>;
}

export interface ReviewRepository {
  list(skip: number, limit: number): Promise<ProductReview[]>;
  create(input: CreateProductReviewInput): Promise<ProductReview>;
  deleteByProductId(productId: number): Promise<number>;
}

export interface Repositories {
  products: ProductRepository;
  variants: VariantRepository;
  images: ImageRepository;
  recommendations: RecommendationRepository;
  carts: CartRepository;
  cartItems: CartItemRepository;
  reviews: ReviewRepository;
}

/**
 * Entry point of the persistence layer. Services read through `repositories`
 * and group multi-statement writes in `transaction`.
 */
export interface DataStore {
  readonly repositories: Repositories;
  transaction<T>(work: (repositories: Repositories) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
}
