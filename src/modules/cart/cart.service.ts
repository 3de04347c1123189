import { DataStore, Repositories } from '../../connections/db/repositories/types';
import { Cart, CartItem, CartWithItems } from '../../connections/db/models';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { getLogger } from '../../utils/logging';
import { MAX_INT } from '../../utils/validation';
import { CartItemCreateBody } from './cart.validation';

export interface CartCreateResult {
  cart: CartWithItems;
  created: boolean;
}

export class CartService {
  private readonly logger = getLogger(CartService.name);

  constructor(private readonly store: DataStore) {}

  private async requireCart(repositories: Repositories, sessionId: string): Promise<Cart> {
    const cart = await repositories.carts.findBySessionId(sessionId);
    if (!cart) {
      throw new NotFoundError('Cart not found');
    }
    return cart;
  }

  private async requireItem(repositories: Repositories, cart: Cart, itemId: number): Promise<CartItem> {
    const item = await repositories.cartItems.findInCart(cart.id, itemId);
    if (!item) {
      throw new NotFoundError('Item not found in this cart');
    }
    return item;
  }

  private async withItems(repositories: Repositories, cart: Cart): Promise<CartWithItems> {
    const items = await repositories.cartItems.findByCartId(cart.id);
    return { ...cart, items };
  }

  /**
   * Returns the existing cart for the session, or creates it.
   */
  async create(sessionId: string): Promise<CartCreateResult> {
    return this.store.transaction(async repositories => {
      const existing = await repositories.carts.findBySessionId(sessionId);
      if (existing) {
        return { cart: await this.withItems(repositories, existing), created: false };
      }

      const cart = await repositories.carts.create(sessionId);
      this.logger.info('Cart created', { sessionId });
      return { cart: { ...cart, items: [] }, created: true };
    });
  }

  async get(sessionId: string): Promise<CartWithItems> {
    const { repositories } = this.store;
    const cart = await this.requireCart(repositories, sessionId);
    return this.withItems(repositories, cart);
  }

  /**
   * Removes every item; the cart itself stays.
   */
  async clear(sessionId: string): Promise<CartWithItems> {
    return this.store.transaction(async repositories => {
      const cart = await this.requireCart(repositories, sessionId);
      await repositories.cartItems.deleteByCartId(cart.id);
      return { ...cart, items: [] };
    });
  }

  /**
   * Adds a variant to the session's cart, creating the cart on first use.
   * Adding a variant already in the cart increases its quantity.
   */
  async addItem(sessionId: string, input: CartItemCreateBody): Promise<CartItem> {
    return this.store.transaction(async repositories => {
      const variant = await repositories.variants.findById(input.variant_id);
      if (!variant) {
        throw new NotFoundError('Variant not found');
      }

      const cart =
        (await repositories.carts.findBySessionId(sessionId)) ?? (await repositories.carts.create(sessionId));

      const existing = await repositories.cartItems.findByCartAndVariant(cart.id, variant.id);
      if (existing) {
        const quantity = existing.quantity + input.quantity;
        if (quantity > MAX_INT) {
          throw new ValidationError('Invalid data', [
            { field: 'quantity', message: `Quantity must be at most ${MAX_INT}` },
          ]);
        }
        const updated = await repositories.cartItems.updateQuantity(existing.id, quantity);
        if (!updated) {
          throw new NotFoundError('Item not found in this cart');
        }
        return updated;
      }

      return repositories.cartItems.create({
        cart_id: cart.id,
        variant_id: variant.id,
        quantity: input.quantity,
      });
    });
  }

  async updateItem(sessionId: string, itemId: number, quantity: number): Promise<CartItem> {
    const { repositories } = this.store;
    const cart = await this.requireCart(repositories, sessionId);
    const item = await this.requireItem(repositories, cart, itemId);

    const updated = await repositories.cartItems.updateQuantity(item.id, quantity);
    if (!updated) {
      throw new NotFoundError('Item not found in this cart');
    }
    return updated;
  }

  async deleteItem(sessionId: string, itemId: number): Promise<void> {
    const { repositories } = this.store;
    const cart = await this.requireCart(repositories, sessionId);
    const item = await this.requireItem(repositories, cart, itemId);
    await repositories.cartItems.delete(item.id);
  }
}
