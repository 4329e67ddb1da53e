import type { Subscription } from 'rxjs';
import {
  type EngineConfig,
  type EngineConfigInput,
  type EngineLogger,
  cacheNamespace,
  createLogger,
  resolveEngineConfig,
} from '@offline-attendance/core';
import { BackgroundSync } from './background-sync.js';
import { CacheStore } from './cache/cache-store.js';
import { ControlChannel, type ErrorSource } from './control-channel.js';
import { FetchStrategyEngine } from './fetch-strategy.js';
import { LifecycleManager } from './lifecycle.js';
import { OfflineActionQueue } from './offline-queue.js';
import { PushDispatcher } from './push-dispatcher.js';
import type {
  ClickedNotification,
  KeepAlive,
  NavigationIntent,
  PushPayload,
  WorkerHost,
} from './types.js';

export interface OfflineEngineOptions {
  config?: EngineConfigInput;
  /** Root logger; defaults to a console logger at the configured level */
  logger?: EngineLogger;
}

/**
 * One async handler per host event kind.
 *
 * `install`, `activate` and `sync` reject so the host can react (discard the
 * install, reschedule the sync); every other handler reports its failure to
 * the control channel and resolves.
 */
export interface EngineHandlers {
  install(): Promise<void>;
  activate(): Promise<void>;
  fetch(request: Request, keepAlive: KeepAlive): Promise<Response>;
  sync(tag: string): Promise<void>;
  push(payload: PushPayload | null): Promise<void>;
  notificationclick(
    notification: ClickedNotification,
    action: string,
  ): Promise<NavigationIntent | null>;
  message(data: unknown): Promise<void>;
  error(error: unknown): void;
  unhandledrejection(reason: unknown): void;
}

export type EngineEventKind = keyof EngineHandlers;

/**
 * The offline engine: every component built around one resolved config and
 * one cache namespace.
 */
export class OfflineEngine {
  readonly config: EngineConfig;
  readonly namespace: string;
  readonly logger: EngineLogger;
  readonly cacheStore: CacheStore;
  readonly lifecycle: LifecycleManager;
  readonly queue: OfflineActionQueue;
  readonly backgroundSync: BackgroundSync;
  readonly strategies: FetchStrategyEngine;
  readonly push: PushDispatcher;
  readonly control: ControlChannel;
  readonly handlers: EngineHandlers;
  private readonly errorSubscription: Subscription;

  constructor(host: WorkerHost, options: OfflineEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.namespace = cacheNamespace(this.config);
    this.logger = options.logger ?? createLogger({ module: 'sw', level: this.config.logLevel });

    this.cacheStore = new CacheStore(host.caches, {
      namespace: this.namespace,
      prefix: `${this.config.cacheName}-`,
      origin: host.origin,
      logger: this.logger.child('cache'),
    });

    this.lifecycle = new LifecycleManager({
      cacheStore: this.cacheStore,
      network: host.fetch,
      precacheUrls: this.config.precacheUrls,
      clients: host.clients,
      skipWaiting: () => host.skipWaiting(),
      logger: this.logger.child('lifecycle'),
    });

    this.queue = new OfflineActionQueue({ maxPendingActions: this.config.maxPendingActions });

    this.backgroundSync = new BackgroundSync({
      tag: this.config.syncTag,
      queue: this.queue,
      network: host.fetch,
      registrar: host.registration.sync,
      logger: this.logger.child('sync'),
    });

    this.strategies = new FetchStrategyEngine({
      cacheStore: this.cacheStore,
      network: host.fetch,
      apiPrefix: this.config.apiPrefix,
      rootDocument: this.config.rootDocument,
      offlineActions: this.config.offlineActions,
      queue: this.queue,
      backgroundSync: this.backgroundSync,
      logger: this.logger.child('fetch'),
    });

    this.push = new PushDispatcher({
      notification: this.config.notification,
      surface: host.registration,
      clients: host.clients,
      rootDocument: this.config.rootDocument,
      logger: this.logger.child('push'),
    });

    this.control = new ControlChannel({
      skipWaiting: () => this.lifecycle.skipWaiting(),
      logger: this.logger.child('control'),
    });

    const errorLogger = this.logger.child('error');
    this.errorSubscription = this.control.errors$.subscribe(({ source, error }) => {
      errorLogger.error(`Error during ${source}`, error, { code: error.code });
    });

    this.handlers = this.createHandlers();
  }

  dispose(): void {
    this.errorSubscription.unsubscribe();
    this.control.dispose();
    this.backgroundSync.dispose();
    this.queue.destroy();
    this.lifecycle.dispose();
  }

  private createHandlers(): EngineHandlers {
    const report = (source: ErrorSource, error: unknown) => this.control.reportError(source, error);

    return {
      install: async () => {
        try {
          await this.lifecycle.install();
        } catch (error) {
          throw report('install', error);
        }
      },

      activate: async () => {
        try {
          await this.lifecycle.activate();
        } catch (error) {
          report('activate', error);
        }
      },

      fetch: (request, keepAlive) => this.strategies.handle(request, keepAlive),

      sync: async (tag) => {
        try {
          await this.backgroundSync.handleSync(tag);
        } catch (error) {
          throw report('sync', error);
        }
      },

      push: async (payload) => {
        try {
          await this.push.handlePush(payload);
        } catch (error) {
          report('push', error);
        }
      },

      notificationclick: async (notification, action) => {
        try {
          return await this.push.handleNotificationClick(notification, action);
        } catch (error) {
          report('notificationclick', error);
          return null;
        }
      },

      message: async (data) => {
        try {
          await this.control.handleMessage(data);
        } catch (error) {
          report('message', error);
        }
      },

      error: (error) => {
        report('error', error);
      },

      unhandledrejection: (reason) => {
        report('unhandledrejection', reason);
      },
    };
  }
}

export function createOfflineEngine(host: WorkerHost, options?: OfflineEngineOptions): OfflineEngine {
  return new OfflineEngine(host, options);
}
