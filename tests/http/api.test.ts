import { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import { createApp } from '../../src/app';
import { loadConfig } from '../../src/config/env';
import { DOWNLOAD_MESSAGE } from '../../src/controllers/download.controller';
import { MemoryDocumentStore } from '../fixtures/memoryDocumentStore';
import { TEST_NOW, UNKNOWN_ID, comingSoon, customer, ebook } from '../fixtures/test-data';

/**
 * Drives the HTTP surface end to end against an in-memory store. The app
 * listens on an ephemeral local port for the duration of the suite.
 */
describe('Storefront API', () => {
  let server: Server;
  let api: AxiosInstance;
  let store: MemoryDocumentStore;
  let currentTime: Date;
  let databaseHealthy: boolean;

  beforeAll(async () => {
    store = new MemoryDocumentStore();
    const app = createApp({
      config: loadConfig({
        NODE_ENV: 'test',
        DATABASE_URL: 'mongodb://127.0.0.1:27017',
      }),
      store,
      checkDatabase: async () => databaseHealthy,
      now: () => currentTime,
    });

    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected the test server to listen on a TCP port');
    }

    api = axios.create({
      baseURL: `http://127.0.0.1:${address.port}`,
      validateStatus: () => true,
      maxRedirects: 0,
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  beforeEach(() => {
    currentTime = TEST_NOW;
    databaseHealthy = true;
    store.describeError = undefined;
  });

  const createProduct = async (body: object): Promise<string> => {
    const response = await api.post('/api/products', body);
    expect(response.status).toBe(201);
    return response.data.data.product.id;
  };

  describe('products', () => {
    it('should create and list products', async () => {
      const response = await api.post('/api/products', { ...ebook, description: 'A short read' });

      expect(response.status).toBe(201);
      expect(response.data.success).toBe(true);
      expect(response.data.data.product).toMatchObject({
        title: 'Ebook',
        description: 'A short read',
        price: 9.99,
        file_url: 'https://x/e.pdf',
      });

      const list = await api.get('/api/products');
      expect(list.status).toBe(200);
      expect(list.data.data.products.map((product: { id: string }) => product.id)).toContain(
        response.data.data.product.id
      );
    });

    it('should reject a negative price with 422', async () => {
      const response = await api.post('/api/products', { ...ebook, price: -1 });

      expect(response.status).toBe(422);
      expect(response.data).toEqual({
        success: false,
        message: 'Validation failed',
        errors: [{ field: 'price', message: 'Invalid value' }],
      });
    });
  });

  describe('orders and downloads', () => {
    it('should place an order and resolve its download token', async () => {
      const productId = await createProduct(ebook);

      const placed = await api.post('/api/orders', { ...customer, items: [{ product_id: productId, quantity: 2 }] });

      expect(placed.status).toBe(201);
      const order = placed.data.data.order;
      expect(order.amount).toBe(19.98);
      expect(order.status).toBe('paid');
      expect(order.download_links).toHaveLength(1);
      expect(order.download_links[0].expires_at).toBe('2026-01-08T00:00:00.000Z');

      const fetched = await api.get(`/api/orders/${order.id}`);
      expect(fetched.status).toBe(200);
      expect(fetched.data.data.order).toEqual(order);

      const download = await api.get(`/api/download/${order.download_links[0].token}`);
      expect(download.status).toBe(200);
      expect(download.data.data.file_url).toBe('https://x/e.pdf');
      expect(download.data.data.product.id).toBe(productId);
      expect(download.data.data.message).toBe(DOWNLOAD_MESSAGE);
    });

    it('should redirect to the file when asked to', async () => {
      const productId = await createProduct(ebook);
      const placed = await api.post('/api/orders', { ...customer, items: [{ product_id: productId }] });

      const response = await api.get(`/api/download/${placed.data.data.order.download_links[0].token}?redirect=true`);

      expect(response.status).toBe(302);
      expect(response.headers.location).toBe('https://x/e.pdf');
    });

    it('should answer 410 for an expired token', async () => {
      const productId = await createProduct(ebook);
      const placed = await api.post('/api/orders', { ...customer, items: [{ product_id: productId }] });
      currentTime = new Date('2026-01-09T00:00:00.000Z');

      const response = await api.get(`/api/download/${placed.data.data.order.download_links[0].token}`);

      expect(response.status).toBe(410);
      expect(response.data).toEqual({ success: false, message: 'Link expired' });
    });

    it('should answer 404 for a product without a file', async () => {
      const productId = await createProduct(comingSoon);
      const placed = await api.post('/api/orders', { ...customer, items: [{ product_id: productId }] });

      const response = await api.get(`/api/download/${placed.data.data.order.download_links[0].token}`);

      expect(response.status).toBe(404);
      expect(response.data.message).toBe('File not available for this product');
    });

    it('should answer 404 for an unknown token', async () => {
      const response = await api.get('/api/download/never-issued-token');

      expect(response.status).toBe(404);
      expect(response.data.message).toBe('Invalid token');
    });

    it('should answer 404 and write nothing when a product is unknown', async () => {
      const ordersBefore = store.count('order');

      const response = await api.post('/api/orders', { ...customer, items: [{ product_id: UNKNOWN_ID, quantity: 1 }] });

      expect(response.status).toBe(404);
      expect(response.data.message).toBe(`Product not found: ${UNKNOWN_ID}`);
      expect(store.count('order')).toBe(ordersBefore);
    });

    it('should reject an out-of-range quantity with 422', async () => {
      const response = await api.post('/api/orders', { ...customer, items: [{ product_id: UNKNOWN_ID, quantity: 51 }] });

      expect(response.status).toBe(422);
      expect(response.data.errors).toEqual([{ field: 'items[0].quantity', message: 'Invalid value' }]);
    });

    it('should reject an empty cart with 422', async () => {
      const response = await api.post('/api/orders', { ...customer, items: [] });

      expect(response.status).toBe(422);
      expect(response.data.errors).toContainEqual({ field: 'items', message: 'Invalid value' });
    });

    it('should answer 404 for an unknown order', async () => {
      const response = await api.get(`/api/orders/${UNKNOWN_ID}`);

      expect(response.status).toBe(404);
      expect(response.data).toEqual({ success: false, message: 'Order not found' });
    });
  });

  describe('demo leads', () => {
    it('should acknowledge a lead', async () => {
      const response = await api.post('/api/demo-lead', { name: 'Test Lead', email: 'lead@example.com' });

      expect(response.status).toBe(200);
      expect(response.data).toEqual({
        success: true,
        status: 'ok',
        message: 'We will contact you in 15 minutes.',
      });
    });

    it('should reject a lead without a name', async () => {
      const response = await api.post('/api/demo-lead', { email: 'lead@example.com' });

      expect(response.status).toBe(422);
      expect(response.data.errors).toEqual([{ field: 'name', message: 'Invalid value' }]);
    });
  });

  describe('diagnostics', () => {
    it('should greet on the root path', async () => {
      const response = await api.get('/');

      expect(response.data).toEqual({ message: 'Digital Products Store Backend running' });
    });

    it('should report the store collections', async () => {
      await createProduct(ebook);

      const response = await api.get('/test');

      expect(response.status).toBe(200);
      expect(response.data).toMatchObject({
        backend: 'Running',
        database: 'Connected & Working',
        database_url: 'Set',
        database_name: 'Not Set',
        connection_status: 'Connected',
      });
      expect(response.data.collections).toContain('product');
    });

    it('should report a store failure without failing the request', async () => {
      store.describeError = new Error('connection refused by the database server at 127.0.0.1');

      const response = await api.get('/test');

      expect(response.status).toBe(200);
      expect(response.data.database).toBe('Error: connection refused by the database server at 127.0');
      expect(response.data.connection_status).toBe('Not Connected');
      expect(response.data.collections).toEqual([]);
    });

    it('should answer 200 when the database answers the ping', async () => {
      const response = await api.get('/api/health');

      expect(response.status).toBe(200);
      expect(response.data).toMatchObject({
        success: true,
        status: 'healthy',
        environment: 'test',
        database: 'connected',
      });
    });

    it('should answer 503 when the database is unreachable', async () => {
      databaseHealthy = false;

      const response = await api.get('/api/health');

      expect(response.status).toBe(503);
      expect(response.data).toMatchObject({ success: false, status: 'unhealthy', database: 'disconnected' });
    });

    it('should answer 200 on the basic health check', async () => {
      const response = await api.get('/health');

      expect(response.status).toBe(200);
      expect(response.data).toMatchObject({ status: 'ok', environment: 'test' });
    });
  });

  describe('errors', () => {
    it('should answer 404 for an unknown route', async () => {
      const response = await api.get('/api/nowhere');

      expect(response.status).toBe(404);
      expect(response.data.message).toBe('Route not found: GET /api/nowhere');
    });

    it('should answer 400 for a malformed JSON body', async () => {
      const response = await api.post('/api/orders', '{"items": [', {
        headers: { 'Content-Type': 'application/json' },
        transformRequest: [(data: string) => data],
      });

      expect(response.status).toBe(400);
      expect(response.data.message).toBe('Malformed JSON body');
    });
  });
});
