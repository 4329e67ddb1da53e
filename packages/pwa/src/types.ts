/** How an intercepted request is answered */
export type RequestClass = 'dynamic' | 'navigation' | 'static';

export type LifecycleState =
  | 'idle'
  | 'installing'
  | 'installed'
  | 'activating'
  | 'activated'
  | 'redundant';

export type SyncStatus = 'idle' | 'pending' | 'syncing' | 'completed' | 'failed';

/**
 * The host's "keep me alive until this resolves" contract.
 * Every extendable service worker event satisfies it.
 */
export interface KeepAlive {
  waitUntil(promise: Promise<unknown>): void;
}

// ─── Cache backend ─────────────────────────────────────────────────────

/**
 * One cache namespace. The browser `Cache` satisfies this structurally.
 */
export interface CacheBucket {
  match(request: RequestInfo | URL): Promise<Response | undefined>;
  put(request: RequestInfo | URL, response: Response): Promise<void>;
  delete(request: RequestInfo | URL): Promise<boolean>;
  keys(): Promise<readonly Request[]>;
}

/**
 * Namespaced cache storage. The browser `CacheStorage` satisfies this
 * structurally.
 */
export interface CacheBackend {
  open(cacheName: string): Promise<CacheBucket>;
  keys(): Promise<string[]>;
  delete(cacheName: string): Promise<boolean>;
  has(cacheName: string): Promise<boolean>;
}

// ─── Host surfaces ─────────────────────────────────────────────────────

export type NetworkClient = (request: Request) => Promise<Response>;

export interface WindowClients {
  claim(): Promise<void>;
  openWindow(url: string): Promise<unknown>;
}

export interface SyncRegistrar {
  register(tag: string): Promise<void>;
}

export interface NotificationSurface {
  showNotification(title: string, options?: NotificationRequestOptions): Promise<void>;
}

export interface WorkerRegistration extends NotificationSurface {
  /** Absent where the Background Sync API is not supported */
  readonly sync?: SyncRegistrar;
}

/**
 * Everything the engine consumes from the hosting environment.
 */
export interface WorkerHost {
  /** Origin the worker is served from; relative URLs resolve against it */
  readonly origin: string;
  readonly fetch: NetworkClient;
  readonly caches: CacheBackend;
  readonly clients: WindowClients;
  readonly registration: WorkerRegistration;
  skipWaiting(): Promise<void>;
}

// ─── Sync ──────────────────────────────────────────────────────────────

/**
 * An attendance action recorded while offline, replayed by background sync.
 * `id` doubles as the idempotency key sent to the origin.
 */
export interface PendingSyncAction {
  id: string;
  tag: string;
  method: string;
  url: string;
  body: string | null;
  contentType: string | null;
  recordedAt: number;
  attempts: number;
}

/** Result of replaying a single action */
export type ReplayOutcome = 'done' | 'retry' | 'discard';

export interface DrainResult {
  processed: number;
  discarded: number;
  remaining: number;
}

// ─── Notifications ─────────────────────────────────────────────────────

export type NotificationActionId = 'check-in' | 'check-out';

export interface NotificationAction {
  action: NotificationActionId;
  title: string;
  icon: string;
}

export interface NotificationRequestOptions {
  body: string;
  icon: string;
  badge: string;
  vibrate: number[];
  data: {
    dateOfArrival: number;
    primaryKey: string;
  };
  actions: NotificationAction[];
}

export interface NotificationRequest {
  title: string;
  options: NotificationRequestOptions;
}

export interface PushPayload {
  text(): string;
}

/** The notification handed to a notification-click event */
export interface ClickedNotification {
  close(): void;
}

export interface NavigationIntent {
  url: string;
  /** Action that produced the intent, `null` for a body click */
  action: NotificationActionId | null;
}
