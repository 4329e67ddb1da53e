import {
  CacheWriteError,
  EngineError,
  type EngineLogger,
  silentLogger,
} from '@offline-attendance/core';
import type { CacheBackend } from '../types.js';
import { cacheKey } from './memory-cache-backend.js';

export interface CacheStoreOptions {
  /** Current namespace, e.g. `attendance-tracker-v1.0.0` */
  namespace: string;
  /** Prefix shared by every namespace this app owns, e.g. `attendance-tracker-` */
  prefix: string;
  /** Base for relative URLs */
  origin: string;
  logger?: EngineLogger;
}

/**
 * Versioned view over a {@link CacheBackend}.
 *
 * Reads and writes go to the current namespace only. Entries are keyed by
 * method and full URL; a write stores a clone of the response taken at call
 * time and replaces any previous entry for the same key as a whole.
 */
export class CacheStore {
  readonly namespace: string;
  private readonly prefix: string;
  private readonly origin: string;
  private readonly backend: CacheBackend;
  private readonly logger: EngineLogger;

  constructor(backend: CacheBackend, options: CacheStoreOptions) {
    this.backend = backend;
    this.namespace = options.namespace;
    this.prefix = options.prefix;
    this.origin = options.origin;
    this.logger = options.logger ?? silentLogger;
  }

  /** Turn a URL or request into an absolute request */
  resolve(input: string | URL | Request): Request {
    if (input instanceof Request) return input;
    return new Request(new URL(input, this.origin));
  }

  /** Canonical identity of a request: method plus full URL */
  requestKey(input: string | URL | Request): string {
    const request = this.resolve(input);
    return cacheKey(request.method, request.url);
  }

  async match(input: string | URL | Request): Promise<Response | undefined> {
    // Opening a missing namespace would create it; a lookup must not.
    if (!(await this.backend.has(this.namespace))) return undefined;
    const bucket = await this.backend.open(this.namespace);
    return bucket.match(this.resolve(input));
  }

  /**
   * Write a snapshot of `response`. The clone is taken synchronously, so the
   * caller may hand the original straight back to the page.
   */
  put(input: string | URL | Request, response: Response): Promise<void> {
    const request = this.resolve(input);
    return this.write(request, response.clone());
  }

  /**
   * Write several snapshots. Each entry is replaced whole; the batch is not
   * transactional, callers decide what to roll back.
   */
  async putAll(entries: ReadonlyArray<readonly [Request, Response]>): Promise<void> {
    const snapshots = entries.map(([request, response]) => [request, response.clone()] as const);
    for (const [request, snapshot] of snapshots) {
      await this.write(request, snapshot);
    }
  }

  /** Keys of every entry in the current namespace */
  async entries(): Promise<string[]> {
    if (!(await this.backend.has(this.namespace))) return [];
    const bucket = await this.backend.open(this.namespace);
    const requests = await bucket.keys();
    return requests.map((request) => cacheKey(request.method, request.url));
  }

  async hasNamespace(name: string = this.namespace): Promise<boolean> {
    return this.backend.has(name);
  }

  /** Every namespace present in the backend, including foreign ones */
  async namespaces(): Promise<string[]> {
    return this.backend.keys();
  }

  /** Whether a namespace belongs to this app (any version) */
  ownsNamespace(name: string): boolean {
    return name.startsWith(this.prefix);
  }

  async deleteNamespace(name: string): Promise<boolean> {
    try {
      return await this.backend.delete(name);
    } catch (error) {
      throw new EngineError({
        code: 'OFFLINE_S302',
        message: `Could not delete cache "${name}"`,
        context: { namespace: name },
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private async write(request: Request, snapshot: Response): Promise<void> {
    const key = cacheKey(request.method, request.url);
    try {
      const bucket = await this.backend.open(this.namespace);
      await bucket.put(request, snapshot);
    } catch (error) {
      throw new CacheWriteError(this.namespace, key, error instanceof Error ? error : undefined);
    }
    this.logger.debug('Cached response', { key, status: snapshot.status });
  }
}

export function createCacheStore(backend: CacheBackend, options: CacheStoreOptions): CacheStore {
  return new CacheStore(backend, options);
}
