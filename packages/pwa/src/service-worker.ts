/**
 * Wiring between a service worker global scope and the {@link OfflineEngine}.
 *
 * The scope is described structurally, so the engine type-checks against the
 * DOM library and runs against a fake scope in tests.
 */

import { createOfflineEngine, type OfflineEngine, type OfflineEngineOptions } from './engine.js';
import type {
  CacheBackend,
  ClickedNotification,
  KeepAlive,
  PushPayload,
  WindowClients,
  WorkerHost,
  WorkerRegistration,
} from './types.js';

export type ExtendableEventLike = KeepAlive;

export interface FetchEventLike extends ExtendableEventLike {
  readonly request: Request;
  respondWith(response: Promise<Response>): void;
}

export interface SyncEventLike extends ExtendableEventLike {
  readonly tag: string;
}

export interface PushEventLike extends ExtendableEventLike {
  readonly data: PushPayload | null;
}

export interface NotificationClickEventLike extends ExtendableEventLike {
  readonly notification: ClickedNotification;
  readonly action: string;
}

export interface MessageEventLike extends ExtendableEventLike {
  readonly data: unknown;
}

export interface ErrorEventLike {
  readonly error?: unknown;
  readonly message?: string;
}

export interface RejectionEventLike {
  readonly reason: unknown;
}

export interface ServiceWorkerEventMap {
  install: ExtendableEventLike;
  activate: ExtendableEventLike;
  fetch: FetchEventLike;
  sync: SyncEventLike;
  push: PushEventLike;
  notificationclick: NotificationClickEventLike;
  message: MessageEventLike;
  error: ErrorEventLike;
  unhandledrejection: RejectionEventLike;
}

/** The parts of `ServiceWorkerGlobalScope` the engine uses */
export interface ServiceWorkerScope {
  readonly location: { readonly origin: string };
  readonly caches: CacheBackend;
  readonly clients: WindowClients;
  readonly registration: WorkerRegistration;
  fetch(request: Request): Promise<Response>;
  skipWaiting(): Promise<void>;
  addEventListener<K extends keyof ServiceWorkerEventMap>(
    type: K,
    listener: (event: ServiceWorkerEventMap[K]) => void,
  ): void;
}

/** Host surfaces taken from a service worker scope */
export function hostFromScope(scope: ServiceWorkerScope): WorkerHost {
  return {
    origin: scope.location.origin,
    fetch: (request) => scope.fetch(request),
    caches: scope.caches,
    clients: scope.clients,
    registration: scope.registration,
    skipWaiting: () => scope.skipWaiting(),
  };
}

/**
 * Attach the engine's handlers to the scope. Each handler's promise is
 * handed to the event's keep-alive, or to `respondWith` for fetches.
 */
export function bindServiceWorker(scope: ServiceWorkerScope, engine: OfflineEngine): void {
  const { handlers } = engine;

  scope.addEventListener('install', (event) => {
    event.waitUntil(handlers.install());
  });

  scope.addEventListener('activate', (event) => {
    event.waitUntil(handlers.activate());
  });

  scope.addEventListener('fetch', (event) => {
    event.respondWith(handlers.fetch(event.request, event));
  });

  scope.addEventListener('sync', (event) => {
    event.waitUntil(handlers.sync(event.tag));
  });

  scope.addEventListener('push', (event) => {
    event.waitUntil(handlers.push(event.data));
  });

  scope.addEventListener('notificationclick', (event) => {
    event.waitUntil(handlers.notificationclick(event.notification, event.action));
  });

  scope.addEventListener('message', (event) => {
    event.waitUntil(handlers.message(event.data));
  });

  scope.addEventListener('error', (event) => {
    handlers.error(event.error ?? event.message);
  });

  scope.addEventListener('unhandledrejection', (event) => {
    handlers.unhandledrejection(event.reason);
  });
}

/** Build an engine for the scope and bind it */
export function startServiceWorker(
  scope: ServiceWorkerScope,
  options?: OfflineEngineOptions,
): OfflineEngine {
  const engine = createOfflineEngine(hostFromScope(scope), options);
  bindServiceWorker(scope, engine);
  engine.logger.info('Script loaded', { namespace: engine.namespace });
  return engine;
}
