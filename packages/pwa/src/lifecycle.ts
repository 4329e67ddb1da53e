import { BehaviorSubject, type Observable } from 'rxjs';
import { InstallError, type EngineLogger, silentLogger } from '@offline-attendance/core';
import type { CacheStore } from './cache/cache-store.js';
import type { LifecycleState, NetworkClient, WindowClients } from './types.js';

export interface LifecycleManagerOptions {
  cacheStore: CacheStore;
  network: NetworkClient;
  /** URLs written to the cache on install, in order */
  precacheUrls: readonly string[];
  clients: Pick<WindowClients, 'claim'>;
  skipWaiting: () => Promise<void>;
  logger?: EngineLogger;
}

interface FetchedEntry {
  url: string;
  request: Request;
  response?: Response;
  error?: unknown;
}

/**
 * Install and activate transitions of the worker.
 *
 * Install pre-populates the current namespace with the application shell;
 * activate removes every older namespace of the same app and takes control
 * of the pages that are already open.
 */
export class LifecycleManager {
  private readonly cacheStore: CacheStore;
  private readonly network: NetworkClient;
  private readonly precacheUrls: readonly string[];
  private readonly clients: Pick<WindowClients, 'claim'>;
  private readonly requestSkipWaiting: () => Promise<void>;
  private readonly logger: EngineLogger;
  private readonly stateSubject = new BehaviorSubject<LifecycleState>('idle');

  constructor(options: LifecycleManagerOptions) {
    this.cacheStore = options.cacheStore;
    this.network = options.network;
    this.precacheUrls = options.precacheUrls;
    this.clients = options.clients;
    this.requestSkipWaiting = options.skipWaiting;
    this.logger = options.logger ?? silentLogger;
  }

  get state$(): Observable<LifecycleState> {
    return this.stateSubject.asObservable();
  }

  getState(): LifecycleState {
    return this.stateSubject.getValue();
  }

  /**
   * Fetch every manifest URL fresh and write the shell to the current
   * namespace. Nothing is written unless every URL answered with an OK
   * status; the rejection is left for the host to discard the install.
   */
  async install(): Promise<void> {
    const namespace = this.cacheStore.namespace;
    const end = this.logger.time('install');
    this.setState('installing');
    this.logger.info('Installing', { namespace, urls: this.precacheUrls.length });

    const existedBefore = await this.cacheStore.hasNamespace();

    try {
      const fetched = await Promise.all(this.precacheUrls.map((url) => this.fetchFresh(url)));
      const failed = fetched.filter((entry) => !entry.response?.ok);

      if (failed.length > 0) {
        for (const entry of failed) {
          this.logger.warn('Precache URL unavailable', {
            url: entry.url,
            status: entry.response?.status ?? null,
            error: entry.error instanceof Error ? entry.error.message : undefined,
          });
        }
        const firstError = failed.find((entry) => entry.error instanceof Error)?.error;
        throw new InstallError(
          namespace,
          failed.map((entry) => entry.url),
          firstError instanceof Error ? firstError : undefined,
        );
      }

      await this.writeShell(fetched, existedBefore);
    } catch (error) {
      this.setState('redundant');
      throw error;
    }

    this.setState('installed');
    this.logger.info('Cached all files', { namespace });
    end({ namespace });

    await this.skipWaiting();
  }

  /**
   * Delete every namespace of this app other than the current one, then
   * claim open clients. Running it again with the same version deletes
   * nothing.
   */
  async activate(): Promise<string[]> {
    const current = this.cacheStore.namespace;
    this.setState('activating');

    const names = await this.cacheStore.namespaces();
    const stale = names.filter((name) => name !== current && this.cacheStore.ownsNamespace(name));

    await Promise.all(
      stale.map(async (name) => {
        this.logger.info('Deleting old cache', { namespace: name });
        await this.cacheStore.deleteNamespace(name);
      }),
    );

    await this.clients.claim();
    this.setState('activated');
    this.logger.info('Activated', { namespace: current, deleted: stale });
    return stale;
  }

  /** Proceed to activation without waiting for existing clients to close */
  async skipWaiting(): Promise<void> {
    this.logger.debug('Skipping waiting phase');
    await this.requestSkipWaiting();
  }

  dispose(): void {
    this.stateSubject.complete();
  }

  private async fetchFresh(url: string): Promise<FetchedEntry> {
    const request = new Request(this.cacheStore.resolve(url), { cache: 'reload' });
    try {
      const response = await this.network(request);
      return { url, request, response };
    } catch (error) {
      return { url, request, error };
    }
  }

  private async writeShell(fetched: FetchedEntry[], existedBefore: boolean): Promise<void> {
    const entries: Array<readonly [Request, Response]> = [];
    for (const entry of fetched) {
      if (entry.response) entries.push([entry.request, entry.response]);
    }

    try {
      await this.cacheStore.putAll(entries);
    } catch (error) {
      // A namespace this attempt created must not survive half-filled.
      if (!existedBefore) {
        await this.cacheStore.deleteNamespace(this.cacheStore.namespace);
      }
      throw new InstallError(
        this.cacheStore.namespace,
        [],
        error instanceof Error ? error : undefined,
      );
    }
  }

  private setState(state: LifecycleState): void {
    this.stateSubject.next(state);
  }
}

export function createLifecycleManager(options: LifecycleManagerOptions): LifecycleManager {
  return new LifecycleManager(options);
}
