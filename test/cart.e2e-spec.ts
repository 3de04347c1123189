import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../src/app';
import { InMemoryDataStore } from './support/in-memory-data-store';

describe('Cart API (e2e)', () => {
  let store: InMemoryDataStore;
  let app: Express;
  let variantId: number;

  beforeEach(async () => {
    store = new InMemoryDataStore();
    app = createApp(store);
    const res = await request(app)
      .post('/api/v1/product')
      .send({
        name: 'Hoodie',
        price: 45,
        description: 'Zip hoodie',
        variants: [{ color: 'Grey', size: 'L', in_stock: true }],
      });
    variantId = res.body.data.variants[0].id;
  });

  describe('POST /api/v1/cart', () => {
    it('creates a cart once and returns it again afterwards', async () => {
      const first = await request(app).post('/api/v1/cart').send({ session_id: 'sess-1' });
      const second = await request(app).post('/api/v1/cart').send({ session_id: 'sess-1' });

      expect(first.status).toBe(201);
      expect(first.body.message).toBe('Cart created successfully');
      expect(first.body.data).toMatchObject({ session_id: 'sess-1', items: [] });
      expect(second.status).toBe(200);
      expect(second.body.message).toBe('Cart already exists');
      expect(second.body.data.id).toBe(first.body.data.id);
    });

    it('rejects a missing session id', async () => {
      const res = await request(app).post('/api/v1/cart').send({});

      expect(res.status).toBe(422);
      expect(res.body.error.details[0].field).toBe('session_id');
    });
  });

  describe('GET /api/v1/cart/:session_id', () => {
    it('returns 404 for an unknown session', async () => {
      const res = await request(app).get('/api/v1/cart/unknown');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Cart not found');
    });
  });

  describe('items', () => {
    it('adds an item to a cart created on the fly', async () => {
      const res = await request(app)
        .post('/api/v1/cart/sess-2/items')
        .send({ variant_id: variantId, quantity: 2 });

      expect(res.status).toBe(201);
      expect(res.body.message).toBe('Item added to cart');
      expect(res.body.data).toMatchObject({ variant_id: variantId, quantity: 2 });

      const cart = await request(app).get('/api/v1/cart/sess-2');
      expect(cart.status).toBe(200);
      expect(cart.body.data.items).toHaveLength(1);
    });

    it('merges repeated adds of the same variant', async () => {
      await request(app).post('/api/v1/cart/sess-3/items').send({ variant_id: variantId, quantity: 1 });
      const res = await request(app).post('/api/v1/cart/sess-3/items').send({ variant_id: variantId, quantity: 4 });

      expect(res.body.data.quantity).toBe(5);
    });

    it('rejects a zero quantity with 422', async () => {
      const res = await request(app).post('/api/v1/cart/sess-4/items').send({ variant_id: variantId, quantity: 0 });

      expect(res.status).toBe(422);
      expect(res.body.error.details).toEqual([{ field: 'quantity', message: 'Quantity must be greater than 0' }]);
    });

    it('returns 404 for an unknown variant', async () => {
      const res = await request(app).post('/api/v1/cart/sess-5/items').send({ variant_id: 999, quantity: 1 });

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Variant not found');
      expect(store.tables.carts).toEqual([]);
    });

    it('updates and deletes an item', async () => {
      const added = await request(app)
        .post('/api/v1/cart/sess-6/items')
        .send({ variant_id: variantId, quantity: 1 });
      const itemId = added.body.data.id;

      const updated = await request(app).put(`/api/v1/cart/sess-6/items/${itemId}`).send({ quantity: 3 });
      expect(updated.status).toBe(200);
      expect(updated.body.data.quantity).toBe(3);

      const deleted = await request(app).delete(`/api/v1/cart/sess-6/items/${itemId}`);
      expect(deleted.status).toBe(200);
      expect(deleted.body.data).toEqual({ id: itemId });
    });

    it('does not let one session touch another session item', async () => {
      const added = await request(app)
        .post('/api/v1/cart/owner/items')
        .send({ variant_id: variantId, quantity: 1 });
      await request(app).post('/api/v1/cart').send({ session_id: 'other' });

      const res = await request(app).delete(`/api/v1/cart/other/items/${added.body.data.id}`);

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Item not found in this cart');
    });
  });

  describe('quantity bounds', () => {
    const addItem = (sessionId: string, body: Record<string, unknown>) =>
      request(app).post(`/api/v1/cart/${sessionId}/items`).send(body);

    it.each([0, -1])('rejects updating a quantity to %d and keeps the stored one', async quantity => {
      const added = await addItem('sess-8', { variant_id: variantId, quantity: 2 });
      const itemId = added.body.data.id;

      const res = await request(app).put(`/api/v1/cart/sess-8/items/${itemId}`).send({ quantity });

      expect(res.status).toBe(422);
      expect(res.body.error.details[0].field).toBe('quantity');
      const cart = await request(app).get('/api/v1/cart/sess-8');
      expect(cart.body.data.items[0].quantity).toBe(2);
    });

    it('rejects an update above the INTEGER range', async () => {
      const added = await addItem('sess-9', { variant_id: variantId, quantity: 1 });

      const res = await request(app)
        .put(`/api/v1/cart/sess-9/items/${added.body.data.id}`)
        .send({ quantity: 2147483648 });

      expect(res.status).toBe(422);
      expect(res.body.error.details).toEqual([{ field: 'quantity', message: 'Quantity must be at most 2147483647' }]);
    });

    it('rejects a variant id and quantity above the INTEGER range', async () => {
      const res = await addItem('sess-10', { variant_id: 3000000000, quantity: 3000000000 });

      expect(res.status).toBe(422);
      expect(res.body.error.details.map((detail: { field: string }) => detail.field)).toEqual([
        'variant_id',
        'quantity',
      ]);
      expect(store.tables.carts).toEqual([]);
    });

    it('rejects an add that would push the merged quantity past the INTEGER range', async () => {
      await addItem('sess-11', { variant_id: variantId, quantity: 2147483647 });

      const res = await addItem('sess-11', { variant_id: variantId, quantity: 1 });

      expect(res.status).toBe(422);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.details).toEqual([{ field: 'quantity', message: 'Quantity must be at most 2147483647' }]);
      expect(store.tables.cartItems[0].quantity).toBe(2147483647);
    });

    it('rejects an out of range item id in the path', async () => {
      const res = await request(app).delete('/api/v1/cart/sess-12/items/99999999999999999999');

      expect(res.status).toBe(422);
      expect(res.body.error.details[0].field).toBe('item_id');
    });
  });

  describe('DELETE /api/v1/cart/:session_id', () => {
    it('clears the items and keeps the cart', async () => {
      await request(app).post('/api/v1/cart/sess-7/items').send({ variant_id: variantId, quantity: 2 });

      const res = await request(app).delete('/api/v1/cart/sess-7');

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Cart cleared');
      expect(res.body.data.items).toEqual([]);
      expect((await request(app).get('/api/v1/cart/sess-7')).status).toBe(200);
    });
  });
});
