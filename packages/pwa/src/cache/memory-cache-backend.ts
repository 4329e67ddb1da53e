import type { CacheBackend, CacheBucket } from '../types.js';

/** Statuses whose responses cannot carry a body */
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/**
 * Immutable copy of a response taken at write time
 */
interface ResponseSnapshot {
  readonly status: number;
  readonly statusText: string;
  readonly headers: ReadonlyArray<readonly [string, string]>;
  readonly body: ArrayBuffer | null;
}

interface StoredEntry {
  readonly method: string;
  readonly url: string;
  readonly snapshot: ResponseSnapshot;
}

export interface MemoryCacheBackendOptions {
  /** Base for relative request URLs (default: `http://localhost`) */
  baseUrl?: string;
}

/**
 * Cache key for a request: method plus the full URL, query included.
 */
export function cacheKey(method: string, url: string): string {
  return `${method.toUpperCase()} ${url}`;
}

class MemoryCacheBucket implements CacheBucket {
  private readonly entries = new Map<string, StoredEntry>();

  constructor(private readonly baseUrl: string) {}

  async match(request: RequestInfo | URL): Promise<Response | undefined> {
    const { method, url } = this.identify(request);
    const entry = this.entries.get(cacheKey(method, url));
    return entry ? restore(entry.snapshot) : undefined;
  }

  async put(request: RequestInfo | URL, response: Response): Promise<void> {
    const { method, url } = this.identify(request);
    if (response.status === 0) {
      throw new TypeError(`Cannot store an opaque response for ${url}`);
    }

    // The body is read completely before the entry is swapped in, so a
    // reader never sees a partially written snapshot.
    const body = response.body === null ? null : await response.arrayBuffer();
    const snapshot: ResponseSnapshot = {
      status: response.status,
      statusText: response.statusText,
      headers: [...response.headers.entries()],
      body,
    };

    this.entries.set(cacheKey(method, url), { method, url, snapshot });
  }

  async delete(request: RequestInfo | URL): Promise<boolean> {
    const { method, url } = this.identify(request);
    return this.entries.delete(cacheKey(method, url));
  }

  async keys(): Promise<readonly Request[]> {
    return [...this.entries.values()].map((entry) => new Request(entry.url, { method: entry.method }));
  }

  private identify(request: RequestInfo | URL): { method: string; url: string } {
    if (request instanceof Request) {
      return { method: request.method, url: request.url };
    }
    return { method: 'GET', url: new URL(String(request), this.baseUrl).href };
  }
}

function restore(snapshot: ResponseSnapshot): Response {
  const body =
    snapshot.body === null || NULL_BODY_STATUSES.has(snapshot.status) ? null : snapshot.body.slice(0);
  return new Response(body, {
    status: snapshot.status,
    statusText: snapshot.statusText,
    headers: snapshot.headers.map(([name, value]): [string, string] => [name, value]),
  });
}

/**
 * In-process cache storage with the same shape as the browser `CacheStorage`.
 *
 * Used where no `caches` global exists (Node.js, tests). Namespaces keep
 * insertion order, as `CacheStorage.keys()` does.
 */
export class MemoryCacheBackend implements CacheBackend {
  private readonly buckets = new Map<string, MemoryCacheBucket>();
  private readonly baseUrl: string;

  constructor(options: MemoryCacheBackendOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'http://localhost';
  }

  async open(cacheName: string): Promise<CacheBucket> {
    let bucket = this.buckets.get(cacheName);
    if (!bucket) {
      bucket = new MemoryCacheBucket(this.baseUrl);
      this.buckets.set(cacheName, bucket);
    }
    return bucket;
  }

  async keys(): Promise<string[]> {
    return [...this.buckets.keys()];
  }

  async delete(cacheName: string): Promise<boolean> {
    return this.buckets.delete(cacheName);
  }

  async has(cacheName: string): Promise<boolean> {
    return this.buckets.has(cacheName);
  }
}

export function createMemoryCacheBackend(options?: MemoryCacheBackendOptions): MemoryCacheBackend {
  return new MemoryCacheBackend(options);
}
