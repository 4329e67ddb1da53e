import { vi } from 'vitest';
import { createLogger, type EngineLogger, type LogEntry } from '@offline-attendance/core';
import { MemoryCacheBackend } from '../cache/memory-cache-backend.js';
import type { KeepAlive, NotificationRequestOptions, WorkerHost } from '../types.js';

export const ORIGIN = 'https://attendance.test';

export type RouteHandler = (request: Request) => Response | Promise<Response>;

/**
 * Stand-in for the origin. Routes match on full URL first, then on path;
 * unknown URLs answer 404. While offline every call rejects like a failed
 * `fetch`.
 */
export function createFakeNetwork() {
  const routes = new Map<string, RouteHandler>();
  const requests: Request[] = [];
  let online = true;

  const fetch = vi.fn(async (request: Request): Promise<Response> => {
    requests.push(request);
    if (!online) {
      throw new TypeError('Failed to fetch');
    }
    const url = new URL(request.url);
    const handler = routes.get(url.href) ?? routes.get(url.pathname);
    if (!handler) {
      return new Response('Not Found', { status: 404 });
    }
    return handler(request);
  });

  return {
    fetch,
    requests,
    route(pathOrUrl: string, handler: RouteHandler): void {
      routes.set(pathOrUrl, handler);
    },
    setOnline(value: boolean): void {
      online = value;
    },
  };
}

export type FakeNetwork = ReturnType<typeof createFakeNetwork>;

export function textResponse(body: string, init: ResponseInit = {}): Response {
  return new Response(body, { status: 200, ...init });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** A request flagged as a full-page navigation */
export function navigationRequest(url: string): Request {
  const request = new Request(new URL(url, ORIGIN));
  Object.defineProperty(request, 'mode', { value: 'navigate' });
  return request;
}

/**
 * Collects `waitUntil` promises so a test can wait for detached work the
 * way the host would.
 */
export function createKeepAlive() {
  const pending: Promise<unknown>[] = [];
  const keepAlive = {
    pending,
    waitUntil(promise: Promise<unknown>): void {
      pending.push(promise);
    },
    async settle(): Promise<PromiseSettledResult<unknown>[]> {
      let results: PromiseSettledResult<unknown>[] = [];
      let seen = -1;
      while (seen !== pending.length) {
        seen = pending.length;
        results = await Promise.allSettled(pending);
      }
      return results;
    },
  };
  return keepAlive satisfies KeepAlive;
}

export function createCapturingLogger(module = 'sw'): { logger: EngineLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({ module, level: 'debug', handler: (entry) => entries.push(entry) });
  return { logger, entries };
}

/**
 * A complete fake host: network, in-memory caches, clients and registration.
 */
export function createTestHost(options: { syncSupported?: boolean } = {}) {
  const network = createFakeNetwork();
  const caches = new MemoryCacheBackend({ baseUrl: ORIGIN });
  const clients = {
    claim: vi.fn(async (): Promise<void> => {}),
    openWindow: vi.fn(async (_url: string): Promise<unknown> => null),
  };
  const sync = { register: vi.fn(async (_tag: string): Promise<void> => {}) };
  const registration = {
    showNotification: vi.fn(
      async (_title: string, _options?: NotificationRequestOptions): Promise<void> => {},
    ),
    ...(options.syncSupported === false ? {} : { sync }),
  };
  const skipWaiting = vi.fn(async (): Promise<void> => {});

  const host: WorkerHost = {
    origin: ORIGIN,
    fetch: network.fetch,
    caches,
    clients,
    registration,
    skipWaiting,
  };

  return { host, network, caches, clients, registration, sync, skipWaiting };
}

export type TestHost = ReturnType<typeof createTestHost>;
