import {
  type EngineLogger,
  type OfflineActionRoute,
  silentLogger,
} from '@offline-attendance/core';
import type { BackgroundSync } from './background-sync.js';
import type { CacheStore } from './cache/cache-store.js';
import type { OfflineActionQueue } from './offline-queue.js';
import {
  QUEUED_ACTION_HEADER,
  offlineGenericResponse,
  offlineHtmlResponse,
  offlineJsonResponse,
} from './offline-responses.js';
import type { KeepAlive, NetworkClient, RequestClass } from './types.js';

export interface FetchStrategyOptions {
  cacheStore: CacheStore;
  network: NetworkClient;
  /** Paths under this prefix are answered network-first */
  apiPrefix: string;
  /** Document served to offline navigations */
  rootDocument: string;
  /** Routes whose failed requests are queued for background sync */
  offlineActions?: readonly OfflineActionRoute[];
  queue?: OfflineActionQueue;
  backgroundSync?: BackgroundSync;
  logger?: EngineLogger;
}

/**
 * Whether a static response may be stored: a plain, same-origin `200`.
 * Opaque and CORS responses are left alone.
 */
export function isCacheableStatic(request: Request, response: Response): boolean {
  return (
    request.method === 'GET' &&
    response.status === 200 &&
    (response.type === 'basic' || response.type === 'default')
  );
}

/**
 * Chooses and runs the strategy for each intercepted request.
 *
 * - dynamic (API prefix): network first, then cache, then the offline JSON
 * - static and navigation: cache first, then network, then the offline page
 *   or a plain 503
 *
 * {@link handle} always resolves; every path ends in a live, cached or
 * synthesized response.
 */
export class FetchStrategyEngine {
  private readonly cacheStore: CacheStore;
  private readonly network: NetworkClient;
  private readonly apiPrefix: string;
  private readonly rootDocument: string;
  private readonly offlineActions: readonly OfflineActionRoute[];
  private readonly queue: OfflineActionQueue | undefined;
  private readonly backgroundSync: BackgroundSync | undefined;
  private readonly logger: EngineLogger;

  constructor(options: FetchStrategyOptions) {
    this.cacheStore = options.cacheStore;
    this.network = options.network;
    this.apiPrefix = options.apiPrefix;
    this.rootDocument = options.rootDocument;
    this.offlineActions = options.offlineActions ?? [];
    this.queue = options.queue;
    this.backgroundSync = options.backgroundSync;
    this.logger = options.logger ?? silentLogger;
  }

  classify(request: Request): RequestClass {
    const { pathname } = new URL(request.url);
    if (pathname.startsWith(this.apiPrefix)) return 'dynamic';
    if (request.mode === 'navigate') return 'navigation';
    return 'static';
  }

  async handle(request: Request, keepAlive: KeepAlive): Promise<Response> {
    const requestClass = this.classify(request);
    try {
      return requestClass === 'dynamic'
        ? await this.networkFirst(request, keepAlive)
        : await this.cacheFirst(request, requestClass === 'navigation');
    } catch (error) {
      this.logger.error('Strategy failed, answering with fallback', error, {
        url: request.url,
        requestClass,
      });
      if (requestClass === 'dynamic') return offlineJsonResponse();
      if (requestClass === 'navigation') return offlineHtmlResponse();
      return offlineGenericResponse();
    }
  }

  /**
   * Live response whatever its status; successful GETs are snapshotted in
   * the background.
   */
  async networkFirst(request: Request, keepAlive: KeepAlive): Promise<Response> {
    const route = this.matchOfflineAction(request);
    // The network call consumes the body; keep a copy in case it must be queued.
    const replayCopy = route ? request.clone() : null;

    let response: Response;
    try {
      response = await this.network(request);
    } catch (error) {
      this.logger.debug('Network unavailable for API request', {
        url: request.url,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.dynamicFallback(request, replayCopy, keepAlive);
    }

    if (request.method === 'GET' && response.ok) {
      this.detachWrite(request, response, keepAlive);
    }
    return response;
  }

  /**
   * Cached snapshot without touching the network; on a miss a cacheable
   * network answer is stored before it is returned.
   */
  async cacheFirst(request: Request, navigation: boolean): Promise<Response> {
    const cached = await this.cacheStore.match(request);
    if (cached) {
      this.logger.debug('Serving from cache', { url: request.url });
      return cached;
    }

    this.logger.debug('Fetching from network', { url: request.url });
    let response: Response;
    try {
      response = await this.network(request);
    } catch {
      return navigation ? this.navigationFallback() : offlineGenericResponse();
    }

    if (isCacheableStatic(request, response)) {
      await this.cacheStore
        .put(request, response)
        .catch((error: unknown) => this.logDroppedWrite(request, error));
    }
    return response;
  }

  private async dynamicFallback(
    request: Request,
    replayCopy: Request | null,
    keepAlive: KeepAlive,
  ): Promise<Response> {
    const cached = await this.cacheStore.match(request);
    if (cached) {
      this.logger.info('Serving cached API response while offline', { url: request.url });
      return cached;
    }

    if (replayCopy && this.queue && this.backgroundSync) {
      try {
        const action = await this.queue.enqueueRequest(replayCopy, this.backgroundSync.getTag());
        this.logger.info('Queued offline action', { id: action.id, url: action.url });
        keepAlive.waitUntil(
          this.backgroundSync.register().catch((error: unknown) => {
            this.logger.error('Could not register background sync', error);
          }),
        );
        return offlineJsonResponse({ [QUEUED_ACTION_HEADER]: action.id });
      } catch (error) {
        this.logger.error('Could not queue offline action', error, { url: request.url });
      }
    }

    return offlineJsonResponse();
  }

  private async navigationFallback(): Promise<Response> {
    const root = await this.cacheStore.match(this.rootDocument);
    return root ?? offlineHtmlResponse();
  }

  /**
   * Store a snapshot without holding up the response. The write is kept
   * alive by the event; its failure is logged and dropped.
   */
  private detachWrite(request: Request, response: Response, keepAlive: KeepAlive): void {
    const write = this.cacheStore
      .put(request, response)
      .catch((error: unknown) => this.logDroppedWrite(request, error));
    keepAlive.waitUntil(write);
  }

  private logDroppedWrite(request: Request, error: unknown): void {
    this.logger.warn('Cache write dropped', {
      url: request.url,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  private matchOfflineAction(request: Request): OfflineActionRoute | undefined {
    const { pathname } = new URL(request.url);
    return this.offlineActions.find(
      (route) => route.method === request.method && route.path === pathname,
    );
  }
}

export function createFetchStrategyEngine(options: FetchStrategyOptions): FetchStrategyEngine {
  return new FetchStrategyEngine(options);
}
