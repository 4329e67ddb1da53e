import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { BackgroundSync } from '../background-sync.js';
import { CacheStore } from '../cache/cache-store.js';
import { MemoryCacheBackend } from '../cache/memory-cache-backend.js';
import { FetchStrategyEngine, isCacheableStatic } from '../fetch-strategy.js';
import { OfflineActionQueue } from '../offline-queue.js';
import { OFFLINE_JSON_BODY, OFFLINE_PAGE_TITLE, QUEUED_ACTION_HEADER } from '../offline-responses.js';
import {
  ORIGIN,
  createCapturingLogger,
  createFakeNetwork,
  createKeepAlive,
  jsonResponse,
  navigationRequest,
  textResponse,
  type FakeNetwork,
} from './helpers.js';

const NAMESPACE = 'attendance-tracker-v1.0.0';

function withType(response: Response, type: ResponseType): Response {
  Object.defineProperty(response, 'type', { value: type });
  return response;
}

describe('FetchStrategyEngine', () => {
  let backend: MemoryCacheBackend;
  let cacheStore: CacheStore;
  let network: FakeNetwork;
  let queue: OfflineActionQueue;
  let sync: BackgroundSync;
  let register: Mock<(tag: string) => Promise<void>>;
  let engine: FetchStrategyEngine;

  beforeEach(() => {
    backend = new MemoryCacheBackend({ baseUrl: ORIGIN });
    cacheStore = new CacheStore(backend, {
      namespace: NAMESPACE,
      prefix: 'attendance-tracker-',
      origin: ORIGIN,
    });
    network = createFakeNetwork();
    queue = new OfflineActionQueue({ createId: () => 'action-1' });
    register = vi.fn(async (_tag: string) => {});
    sync = new BackgroundSync({
      tag: 'attendance-sync',
      queue,
      network: network.fetch,
      registrar: { register },
    });
    engine = new FetchStrategyEngine({
      cacheStore,
      network: network.fetch,
      apiPrefix: '/api/',
      rootDocument: '/',
      offlineActions: [
        { method: 'POST', path: '/api/checkin' },
        { method: 'POST', path: '/api/checkout' },
      ],
      queue,
      backgroundSync: sync,
    });
  });

  afterEach(() => {
    sync.dispose();
    queue.destroy();
  });

  describe('classify', () => {
    it('should treat the API prefix as dynamic', () => {
      expect(engine.classify(new Request(`${ORIGIN}/api/attendance?date=2025-08-01`))).toBe('dynamic');
    });

    it('should treat API navigations as dynamic', () => {
      expect(engine.classify(navigationRequest('/api/export'))).toBe('dynamic');
    });

    it('should treat page loads as navigation', () => {
      expect(engine.classify(navigationRequest('/dashboard'))).toBe('navigation');
    });

    it('should treat everything else as static', () => {
      expect(engine.classify(new Request(`${ORIGIN}/static/app.js`))).toBe('static');
      expect(engine.classify(new Request(`${ORIGIN}/apix`))).toBe('static');
    });
  });

  describe('dynamic requests', () => {
    it('should return the live response and snapshot it', async () => {
      network.route('/api/attendance', () => jsonResponse({ records: 3 }));
      const keepAlive = createKeepAlive();

      const response = await engine.handle(new Request(`${ORIGIN}/api/attendance`), keepAlive);

      expect(await response.json()).toEqual({ records: 3 });
      expect(keepAlive.pending).toHaveLength(1);
      await keepAlive.settle();
      expect(await (await cacheStore.match('/api/attendance'))?.json()).toEqual({ records: 3 });
    });

    it('should pass error statuses through without caching them', async () => {
      network.route('/api/attendance', () => jsonResponse({ error: 'boom' }, 500));
      const keepAlive = createKeepAlive();

      const response = await engine.handle(new Request(`${ORIGIN}/api/attendance`), keepAlive);

      expect(response.status).toBe(500);
      expect(keepAlive.pending).toHaveLength(0);
    });

    it('should not cache non-GET responses', async () => {
      network.route('/api/checkin', () => jsonResponse({ success: true }));
      const keepAlive = createKeepAlive();

      const response = await engine.handle(
        new Request(`${ORIGIN}/api/checkin`, { method: 'POST', body: '{}' }),
        keepAlive,
      );

      expect(response.status).toBe(200);
      expect(keepAlive.pending).toHaveLength(0);
      expect(await cacheStore.entries()).toEqual([]);
    });

    it('should fall back to the cached snapshot when offline', async () => {
      await cacheStore.put('/api/attendance', jsonResponse({ records: 2 }));
      network.setOnline(false);

      const response = await engine.handle(new Request(`${ORIGIN}/api/attendance`), createKeepAlive());

      expect(await response.json()).toEqual({ records: 2 });
    });

    it('should answer with the offline JSON when nothing is cached', async () => {
      network.setOnline(false);

      const response = await engine.handle(new Request(`${ORIGIN}/api/attendance`), createKeepAlive());

      expect(response.status).toBe(503);
      expect(response.headers.get('Content-Type')).toBe('application/json');
      expect(await response.json()).toEqual(OFFLINE_JSON_BODY);
    });

    it('should queue an offline check-in and register a sync', async () => {
      network.setOnline(false);
      const keepAlive = createKeepAlive();

      const response = await engine.handle(
        new Request(`${ORIGIN}/api/checkin`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: '{"note":"front desk"}',
        }),
        keepAlive,
      );

      expect(response.status).toBe(503);
      expect(response.headers.get(QUEUED_ACTION_HEADER)).toBe('action-1');
      expect(await response.json()).toEqual(OFFLINE_JSON_BODY);
      expect(queue.snapshot()).toEqual([
        expect.objectContaining({
          id: 'action-1',
          tag: 'attendance-sync',
          method: 'POST',
          url: `${ORIGIN}/api/checkin`,
          body: '{"note":"front desk"}',
          contentType: 'application/json',
          attempts: 0,
        }),
      ]);

      await keepAlive.settle();
      expect(register).toHaveBeenCalledWith('attendance-sync');
    });

    it('should not queue requests outside the action routes', async () => {
      network.setOnline(false);

      const response = await engine.handle(
        new Request(`${ORIGIN}/api/profile`, { method: 'POST', body: '{}' }),
        createKeepAlive(),
      );

      expect(response.headers.get(QUEUED_ACTION_HEADER)).toBeNull();
      expect(queue.size).toBe(0);
    });

    it('should still answer when the queue is full', async () => {
      const full = new OfflineActionQueue({ maxPendingActions: 0 });
      const { logger, entries } = createCapturingLogger('sw:fetch');
      const limited = new FetchStrategyEngine({
        cacheStore,
        network: network.fetch,
        apiPrefix: '/api/',
        rootDocument: '/',
        offlineActions: [{ method: 'POST', path: '/api/checkin' }],
        queue: full,
        backgroundSync: sync,
        logger,
      });
      network.setOnline(false);

      const response = await limited.handle(
        new Request(`${ORIGIN}/api/checkin`, { method: 'POST', body: '{}' }),
        createKeepAlive(),
      );

      expect(response.status).toBe(503);
      expect(response.headers.get(QUEUED_ACTION_HEADER)).toBeNull();
      expect(entries.find((entry) => entry.level === 'error')?.message).toBe(
        'Could not queue offline action',
      );
    });
  });

  describe('static requests', () => {
    it('should serve a cached entry without touching the network', async () => {
      await cacheStore.put('/static/app.css', textResponse('body{}'));

      const response = await engine.handle(new Request(`${ORIGIN}/static/app.css`), createKeepAlive());

      expect(await response.text()).toBe('body{}');
      expect(network.fetch).not.toHaveBeenCalled();
    });

    it('should fetch and cache a plain 200 on a miss', async () => {
      network.route('/static/app.js', () => textResponse('console.log(1)'));

      const response = await engine.handle(new Request(`${ORIGIN}/static/app.js`), createKeepAlive());

      expect(await response.text()).toBe('console.log(1)');
      expect(await cacheStore.entries()).toEqual([`GET ${ORIGIN}/static/app.js`]);
    });

    it('should have stored the entry by the time the response resolves', async () => {
      network.route('/static/app.js', () => textResponse('console.log(1)'));
      const keepAlive = createKeepAlive();

      await engine.handle(new Request(`${ORIGIN}/static/app.js`), keepAlive);
      network.setOnline(false);
      const second = await engine.handle(new Request(`${ORIGIN}/static/app.js`), createKeepAlive());

      expect(keepAlive.pending).toHaveLength(0);
      expect(second.status).toBe(200);
      expect(await second.text()).toBe('console.log(1)');
      expect(network.fetch).toHaveBeenCalledTimes(1);
    });

    it('should not cache error statuses', async () => {
      const response = await engine.handle(new Request(`${ORIGIN}/static/missing.png`), createKeepAlive());

      expect(response.status).toBe(404);
      expect(await cacheStore.entries()).toEqual([]);
    });

    it('should not cache opaque responses', async () => {
      network.route('https://cdn.example.test/font.woff2', () => withType(textResponse('font'), 'opaque'));

      await engine.handle(new Request('https://cdn.example.test/font.woff2'), createKeepAlive());

      expect(await cacheStore.entries()).toEqual([]);
    });

    it('should answer a plain 503 when offline and uncached', async () => {
      network.setOnline(false);

      const response = await engine.handle(new Request(`${ORIGIN}/static/app.js`), createKeepAlive());

      expect(response.status).toBe(503);
      expect(await response.text()).toBe('Offline');
    });

    it('should still serve the response when the cache write fails', async () => {
      const { logger, entries } = createCapturingLogger('sw:fetch');
      const logged = new FetchStrategyEngine({
        cacheStore,
        network: network.fetch,
        apiPrefix: '/api/',
        rootDocument: '/',
        offlineActions: [],
        queue,
        backgroundSync: sync,
        logger,
      });
      network.route('/static/app.js', () => textResponse('console.log(1)'));
      vi.spyOn(cacheStore, 'put').mockRejectedValueOnce(new Error('QuotaExceededError'));

      const response = await logged.handle(new Request(`${ORIGIN}/static/app.js`), createKeepAlive());

      expect(await response.text()).toBe('console.log(1)');
      expect(entries.find((entry) => entry.level === 'warn')).toMatchObject({
        message: 'Cache write dropped',
        context: { url: `${ORIGIN}/static/app.js`, error: 'QuotaExceededError' },
      });
    });
  });

  describe('navigation requests', () => {
    it('should serve the cached root document for any page when offline', async () => {
      await cacheStore.put('/', textResponse('<html>shell</html>'));
      network.setOnline(false);

      const response = await engine.handle(navigationRequest('/reports/weekly'), createKeepAlive());

      expect(await response.text()).toBe('<html>shell</html>');
    });

    it('should serve the offline page when the root document is missing', async () => {
      network.setOnline(false);

      const response = await engine.handle(navigationRequest('/reports/weekly'), createKeepAlive());
      const html = await response.text();

      expect(response.status).toBe(200);
      expect(response.headers.get('Content-Type')).toBe('text/html');
      expect(html).toContain(`<title>${OFFLINE_PAGE_TITLE}</title>`);
      expect(html).toContain("<h1>You're Offline</h1>");
    });
  });

  describe('isCacheableStatic', () => {
    const request = new Request(`${ORIGIN}/static/app.js`);

    it('should accept same-origin 200 responses', () => {
      expect(isCacheableStatic(request, textResponse('ok'))).toBe(true);
      expect(isCacheableStatic(request, withType(textResponse('ok'), 'basic'))).toBe(true);
    });

    it('should reject CORS and non-200 responses', () => {
      expect(isCacheableStatic(request, withType(textResponse('ok'), 'cors'))).toBe(false);
      expect(isCacheableStatic(request, new Response(null, { status: 204 }))).toBe(false);
    });
  });

  it('should resolve with a fallback when the cache lookup throws', async () => {
    vi.spyOn(cacheStore, 'match').mockRejectedValueOnce(new Error('storage unavailable'));

    const response = await engine.handle(navigationRequest('/dashboard'), createKeepAlive());

    expect(response.status).toBe(200);
    expect(await response.text()).toContain(OFFLINE_PAGE_TITLE);
  });
});
