/**
 * @offline-attendance/pwa - offline engine for the attendance tracker
 *
 * Runs inside the service worker: serves the application shell from a
 * versioned cache, answers API calls network-first with cached or synthesized
 * fallbacks, queues attendance actions made offline for background sync, and
 * turns push messages into actionable reminders.
 *
 * ## Quick Start
 *
 * ```typescript
 * // sw.ts
 * import { startServiceWorker } from '@offline-attendance/pwa';
 *
 * startServiceWorker(self as unknown as ServiceWorkerScope, {
 *   config: { version: 'v1.1.0' },
 * });
 * ```
 *
 * ```typescript
 * // page: activate a waiting worker right away
 * registration.waiting?.postMessage({ type: 'SKIP_WAITING' });
 * ```
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './cache/index.js';

export { LifecycleManager, createLifecycleManager, type LifecycleManagerOptions } from './lifecycle.js';

export {
  FetchStrategyEngine,
  createFetchStrategyEngine,
  isCacheableStatic,
  type FetchStrategyOptions,
} from './fetch-strategy.js';

export {
  OFFLINE_JSON_BODY,
  OFFLINE_PAGE_TITLE,
  QUEUED_ACTION_HEADER,
  offlineGenericResponse,
  offlineHtmlResponse,
  offlineJsonResponse,
} from './offline-responses.js';

export {
  OfflineActionQueue,
  createOfflineActionQueue,
  type OfflineActionQueueOptions,
} from './offline-queue.js';

export {
  BackgroundSync,
  IDEMPOTENCY_KEY_HEADER,
  RECORDED_AT_HEADER,
  createBackgroundSync,
  type BackgroundSyncOptions,
  type BackgroundSyncStats,
  type SyncRegistration,
} from './background-sync.js';

export { PushDispatcher, createPushDispatcher, type PushDispatcherOptions } from './push-dispatcher.js';

export {
  ControlChannel,
  controlMessageSchema,
  createControlChannel,
  type ControlChannelOptions,
  type ControlMessage,
  type ErrorSource,
  type ReportedError,
} from './control-channel.js';

export {
  OfflineEngine,
  createOfflineEngine,
  type EngineEventKind,
  type EngineHandlers,
  type OfflineEngineOptions,
} from './engine.js';

export {
  bindServiceWorker,
  hostFromScope,
  startServiceWorker,
  type ErrorEventLike,
  type ExtendableEventLike,
  type FetchEventLike,
  type MessageEventLike,
  type NotificationClickEventLike,
  type PushEventLike,
  type RejectionEventLike,
  type ServiceWorkerEventMap,
  type ServiceWorkerScope,
  type SyncEventLike,
} from './service-worker.js';
