import { BehaviorSubject, Observable } from 'rxjs';
import {
  EngineError,
  SyncReplayError,
  type EngineLogger,
  silentLogger,
} from '@offline-attendance/core';
import type { OfflineActionQueue } from './offline-queue.js';
import type {
  DrainResult,
  NetworkClient,
  PendingSyncAction,
  ReplayOutcome,
  SyncRegistrar,
  SyncStatus,
} from './types.js';

export const IDEMPOTENCY_KEY_HEADER = 'Idempotency-Key';
export const RECORDED_AT_HEADER = 'X-Offline-Recorded-At';

export interface BackgroundSyncOptions {
  tag: string;
  queue: OfflineActionQueue;
  network: NetworkClient;
  /** Host sync manager; absent where Background Sync is unsupported */
  registrar?: SyncRegistrar;
  logger?: EngineLogger;
}

export interface SyncRegistration {
  tag: string;
  registeredAt: number;
  lastAttempt?: number;
  status: SyncStatus;
}

export interface BackgroundSyncStats {
  pendingActions: number;
  lastSyncAt: number | null;
  failedAttempts: number;
}

/**
 * Replays queued offline actions when the host fires a sync event with the
 * attendance tag.
 *
 * Retry scheduling belongs to the host: a replay that leaves actions behind
 * rejects, and the host fires the sync again later.
 */
export class BackgroundSync {
  private readonly tag: string;
  private readonly queue: OfflineActionQueue;
  private readonly network: NetworkClient;
  private readonly registrar: SyncRegistrar | undefined;
  private readonly logger: EngineLogger;
  private readonly registrationSubject: BehaviorSubject<SyncRegistration | null>;
  private registration: SyncRegistration | null = null;
  private failedAttempts = 0;
  private lastSyncAt: number | null = null;
  /** Last retryable replay failure of the current drain */
  private lastFailure: EngineError | undefined;
  private disposed = false;

  constructor(options: BackgroundSyncOptions) {
    this.tag = options.tag;
    this.queue = options.queue;
    this.network = options.network;
    this.registrar = options.registrar;
    this.logger = options.logger ?? silentLogger;
    this.registrationSubject = new BehaviorSubject<SyncRegistration | null>(null);
  }

  get status$(): Observable<SyncRegistration | null> {
    return this.registrationSubject.asObservable();
  }

  getTag(): string {
    return this.tag;
  }

  /**
   * Ask the host to fire a sync event once connectivity returns.
   * Resolves `false` when the host has no Background Sync support.
   */
  async register(): Promise<boolean> {
    if (this.disposed) return false;

    this.registration = {
      tag: this.tag,
      registeredAt: Date.now(),
      status: 'pending',
    };
    this.emitRegistration();

    if (!this.registrar) {
      this.logger.warn('Background sync unsupported, actions wait for the next sync event', {
        tag: this.tag,
      });
      return false;
    }

    try {
      await this.registrar.register(this.tag);
      this.logger.debug('Registered background sync', { tag: this.tag });
      return true;
    } catch (error) {
      throw new EngineError({
        code: 'OFFLINE_Y602',
        context: { tag: this.tag },
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Handle a host sync event. Other tags resolve `null` untouched.
   */
  async handleSync(tag: string): Promise<DrainResult | null> {
    if (tag !== this.tag || this.disposed) return null;

    this.logger.info('Background sync for attendance', { tag, pending: this.queue.size });
    this.updateRegistration('syncing');
    this.lastFailure = undefined;

    const result = await this.queue.drain((action) => this.replay(action));

    if (result.remaining > 0) {
      this.failedAttempts++;
      this.updateRegistration('failed');
      throw new SyncReplayError(tag, result.remaining, this.lastFailure);
    }

    this.lastSyncAt = Date.now();
    this.updateRegistration('completed');
    this.logger.info('Background sync completed', { ...result });
    return result;
  }

  getRegistration(): SyncRegistration | null {
    return this.registration ? { ...this.registration } : null;
  }

  getStats(): BackgroundSyncStats {
    return {
      pendingActions: this.queue.size,
      lastSyncAt: this.lastSyncAt,
      failedAttempts: this.failedAttempts,
    };
  }

  dispose(): void {
    this.disposed = true;
    this.registration = null;
    this.registrationSubject.complete();
  }

  /**
   * Send one action again. The idempotency key lets the origin recognise an
   * action it already recorded, so replaying twice is harmless.
   */
  private async replay(action: PendingSyncAction): Promise<ReplayOutcome> {
    const headers = new Headers({
      [IDEMPOTENCY_KEY_HEADER]: action.id,
      [RECORDED_AT_HEADER]: new Date(action.recordedAt).toISOString(),
    });
    if (action.contentType) headers.set('Content-Type', action.contentType);

    let response: Response;
    try {
      response = await this.network(
        new Request(action.url, { method: action.method, headers, body: action.body }),
      );
    } catch (error) {
      const context = { id: action.id, url: action.url };
      this.lastFailure =
        error instanceof Error
          ? EngineError.wrap(error, 'OFFLINE_N500', context)
          : new EngineError({ code: 'OFFLINE_N500', context });
      this.logger.warn('Replay failed, keeping action', {
        ...context,
        code: this.lastFailure.code,
        error: this.lastFailure.message,
      });
      return 'retry';
    }

    // 409: the origin already holds this action
    if (response.ok || response.status === 409) {
      this.logger.debug('Replayed action', { id: action.id, status: response.status });
      return 'done';
    }

    if (isPermanentFailure(response.status)) {
      this.logger.warn('Origin rejected action, dropping it', {
        id: action.id,
        url: action.url,
        status: response.status,
      });
      return 'discard';
    }

    this.lastFailure = new EngineError({
      code: 'OFFLINE_N501',
      message: `Origin answered ${response.status} to ${action.method} ${action.url}`,
      context: { id: action.id, status: response.status },
    });
    this.logger.warn('Replay got a retryable status, keeping action', {
      id: action.id,
      status: response.status,
      code: this.lastFailure.code,
    });
    return 'retry';
  }

  private updateRegistration(status: SyncStatus): void {
    if (!this.registration) {
      this.registration = { tag: this.tag, registeredAt: Date.now(), status };
    }
    this.registration.status = status;
    if (status === 'syncing') {
      this.registration.lastAttempt = Date.now();
    }
    this.emitRegistration();
  }

  private emitRegistration(): void {
    if (!this.disposed) {
      this.registrationSubject.next(this.registration ? { ...this.registration } : null);
    }
  }
}

/** Client errors other than timeouts and rate limits will not succeed on retry */
function isPermanentFailure(status: number): boolean {
  return status >= 400 && status < 500 && status !== 408 && status !== 429;
}

export function createBackgroundSync(options: BackgroundSyncOptions): BackgroundSync {
  return new BackgroundSync(options);
}
