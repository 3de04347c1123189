import { InMemoryDataStore } from '../../../../test/support/in-memory-data-store';
import { NotFoundError, ValidationError } from '../../../utils/errors';
import { ProductsService } from '../../products/products.service';
import { CartService } from '../cart.service';

describe('CartService', () => {
  let store: InMemoryDataStore;
  let service: CartService;
  let redId: number;
  let blueId: number;

  beforeEach(async () => {
    store = new InMemoryDataStore();
    service = new CartService(store);
    const product = await new ProductsService(store).create({
      name: 'Tee',
      price: 9.5,
      description: 'Plain tee',
      lifetime_guarantee: true,
      variants: [
        { color: 'Red', size: 'S', in_stock: true },
        { color: 'Blue', size: 'S', in_stock: true },
      ],
      images: [],
    });
    [redId, blueId] = product.variants.map(variant => variant.id);
  });

  describe('create', () => {
    it('should create an empty cart once per session', async () => {
      const first = await service.create('session-a');
      const second = await service.create('session-a');

      expect(first.created).toBe(true);
      expect(first.cart.items).toEqual([]);
      expect(second.created).toBe(false);
      expect(second.cart.id).toBe(first.cart.id);
      expect(store.tables.carts).toHaveLength(1);
    });
  });

  describe('get', () => {
    it('should throw NotFoundError for an unknown session', async () => {
      await expect(service.get('nobody')).rejects.toThrow('Cart not found');
    });
  });

  describe('addItem', () => {
    it('should create the cart on first use', async () => {
      const item = await service.addItem('fresh', { variant_id: redId, quantity: 2 });

      const cart = await service.get('fresh');
      expect(cart.items).toEqual([item]);
      expect(item.quantity).toBe(2);
    });

    it('should sum quantities for the same variant', async () => {
      const first = await service.addItem('s1', { variant_id: redId, quantity: 2 });
      const second = await service.addItem('s1', { variant_id: redId, quantity: 3 });

      expect(second.id).toBe(first.id);
      expect(second.quantity).toBe(5);
      expect((await service.get('s1')).items).toHaveLength(1);
    });

    it('should keep different variants as separate lines', async () => {
      await service.addItem('s1', { variant_id: redId, quantity: 1 });
      await service.addItem('s1', { variant_id: blueId, quantity: 1 });

      const cart = await service.get('s1');
      expect(cart.items.map(item => item.variant_id)).toEqual([redId, blueId]);
    });

    it('should refuse a merge that overflows the stored quantity', async () => {
      await service.addItem('s1', { variant_id: redId, quantity: 2147483647 });

      await expect(service.addItem('s1', { variant_id: redId, quantity: 1 })).rejects.toThrow(ValidationError);
      expect((await service.get('s1')).items[0].quantity).toBe(2147483647);
    });

    it('should not create a cart when the variant is missing', async () => {
      await expect(service.addItem('s2', { variant_id: 999, quantity: 1 })).rejects.toThrow('Variant not found');
      expect(store.tables.carts).toEqual([]);
    });
  });

  describe('updateItem', () => {
    it('should set the quantity', async () => {
      const item = await service.addItem('s1', { variant_id: redId, quantity: 1 });

      const updated = await service.updateItem('s1', item.id, 7);

      expect(updated).toEqual({ ...item, quantity: 7 });
    });

    it('should not touch an item that belongs to another cart', async () => {
      const item = await service.addItem('owner', { variant_id: redId, quantity: 1 });
      await service.create('intruder');

      await expect(service.updateItem('intruder', item.id, 4)).rejects.toThrow('Item not found in this cart');
      expect((await service.get('owner')).items[0].quantity).toBe(1);
    });
  });

  describe('deleteItem', () => {
    it('should remove the line from the cart', async () => {
      const item = await service.addItem('s1', { variant_id: redId, quantity: 1 });

      await service.deleteItem('s1', item.id);

      expect((await service.get('s1')).items).toEqual([]);
    });

    it('should throw NotFoundError for an item in another cart', async () => {
      const item = await service.addItem('owner', { variant_id: redId, quantity: 1 });
      await service.create('intruder');

      await expect(service.deleteItem('intruder', item.id)).rejects.toThrow(NotFoundError);
      expect(store.tables.cartItems).toHaveLength(1);
    });
  });

  describe('clear', () => {
    it('should empty the cart but keep it', async () => {
      await service.addItem('s1', { variant_id: redId, quantity: 1 });
      await service.addItem('s1', { variant_id: blueId, quantity: 2 });

      const cleared = await service.clear('s1');

      expect(cleared.items).toEqual([]);
      expect(cleared.session_id).toBe('s1');
      expect((await service.get('s1')).items).toEqual([]);
    });

    it('should throw NotFoundError for an unknown session', async () => {
      await expect(service.clear('ghost')).rejects.toThrow('Cart not found');
    });
  });
});
