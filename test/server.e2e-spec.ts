import request from 'supertest';
import { createApp } from '../src/app';
import { InMemoryDataStore } from './support/in-memory-data-store';

describe('Server routes (e2e)', () => {
  let store: InMemoryDataStore;

  beforeEach(() => {
    store = new InMemoryDataStore();
  });

  it('GET / reports the service as running', async () => {
    const res = await request(createApp(store)).get('/');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('OK');
    expect(res.body.message).toMatch(/ is running$/);
  });

  it('GET /health reports a connected database', async () => {
    const res = await request(createApp(store)).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'healthy', database: 'connected' });
    expect(typeof res.body.timestamp).toBe('string');
  });

  it('GET /health returns 503 when the database is unreachable', async () => {
    store.healthy = false;

    const res = await request(createApp(store)).get('/health');

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ status: 'unhealthy', database: 'disconnected' });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(createApp(store)).get('/api/v1/nowhere');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: 'Route not found', error: { code: 'NOT_FOUND' } });
  });

  it('answers malformed JSON with 400', async () => {
    const res = await request(createApp(store))
      .post('/api/v1/cart')
      .set('Content-Type', 'application/json')
      .send('{"session_id":');

    expect(res.status).toBe(400);
    expect(res.body.success).toBe(false);
    expect(res.body.error.code).toBe('BAD_REQUEST');
  });

  it('maps database constraint errors to conflicts', async () => {
    store.repositories.products.list = async () => {
      throw Object.assign(new Error('violates foreign key constraint'), { code: '23503' });
    };

    const res = await request(createApp(store)).get('/api/v1/product');

    expect(res.status).toBe(409);
    expect(res.body.error.code).toBe('FOREIGN_KEY_VIOLATION');
  });

  it('maps numeric overflow from the database to 422', async () => {
    store.repositories.products.list = async () => {
      throw Object.assign(new Error('integer out of range'), { code: '22003' });
    };

    const res = await request(createApp(store)).get('/api/v1/product');

    expect(res.status).toBe(422);
    expect(res.body.message).toBe('Value out of range');
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('hides unexpected failures behind a 500', async () => {
    store.repositories.products.list = async () => {
      throw new Error('socket closed');
    };

    const res = await request(createApp(store)).get('/api/v1/product');

    expect(res.status).toBe(500);
    expect(res.body.message).toBe('Internal server error');
    expect(res.body.error.code).toBe('INTERNAL_ERROR');
  });
});
