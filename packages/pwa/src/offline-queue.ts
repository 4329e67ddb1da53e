import { BehaviorSubject, Observable } from 'rxjs';
import { EngineError } from '@offline-attendance/core';
import type { DrainResult, PendingSyncAction, ReplayOutcome } from './types.js';

const DEFAULT_MAX_PENDING_ACTIONS = 100;

export interface OfflineActionQueueOptions {
  maxPendingActions?: number;
  /** Id generator; ids are sent as idempotency keys */
  createId?: () => string;
  now?: () => number;
}

/**
 * FIFO of attendance actions recorded while offline.
 *
 * The queue lives as long as the worker process; keeping it across restarts
 * is up to the host.
 */
export class OfflineActionQueue {
  private items: PendingSyncAction[] = [];
  /** Drained actions whose outcome is still pending or that will be retried */
  private reserved = 0;
  private readonly queueSubject: BehaviorSubject<PendingSyncAction[]>;
  private readonly maxPendingActions: number;
  private readonly createId: () => string;
  private readonly now: () => number;

  constructor(options: OfflineActionQueueOptions = {}) {
    this.maxPendingActions = options.maxPendingActions ?? DEFAULT_MAX_PENDING_ACTIONS;
    this.createId = options.createId ?? (() => crypto.randomUUID());
    this.now = options.now ?? Date.now;
    this.queueSubject = new BehaviorSubject<PendingSyncAction[]>([]);
  }

  get queue$(): Observable<PendingSyncAction[]> {
    return this.queueSubject.asObservable();
  }

  get size(): number {
    return this.items.length;
  }

  snapshot(): PendingSyncAction[] {
    return this.items.map((item) => ({ ...item }));
  }

  enqueue(
    item: Omit<PendingSyncAction, 'id' | 'recordedAt' | 'attempts'>,
  ): PendingSyncAction {
    if (this.items.length + this.reserved >= this.maxPendingActions) {
      throw new EngineError({
        code: 'OFFLINE_Y601',
        message: `Offline action queue is full (max ${this.maxPendingActions})`,
        context: { url: item.url, max: this.maxPendingActions },
      });
    }
    const action: PendingSyncAction = {
      ...item,
      id: this.createId(),
      recordedAt: this.now(),
      attempts: 0,
    };
    this.items.push(action);
    this.emit();
    return { ...action };
  }

  /**
   * Record a request for later replay. The body is read from a clone, so the
   * request itself stays usable.
   */
  async enqueueRequest(request: Request, tag: string): Promise<PendingSyncAction> {
    const body = await request.clone().text();
    return this.enqueue({
      tag,
      method: request.method,
      url: request.url,
      body: body.length > 0 ? body : null,
      contentType: request.headers.get('Content-Type'),
    });
  }

  /**
   * Hand every queued action to `processor`, in order. Actions enqueued while
   * the drain runs are kept behind the ones that still need a retry, and the
   * actions being drained keep counting against `maxPendingActions`.
   */
  async drain(
    processor: (action: PendingSyncAction) => Promise<ReplayOutcome>,
  ): Promise<DrainResult> {
    const batch = this.items;
    this.items = [];
    this.reserved += batch.length;

    let processed = 0;
    let discarded = 0;
    const retry: PendingSyncAction[] = [];

    for (const action of batch) {
      let outcome: ReplayOutcome;
      try {
        outcome = await processor({ ...action });
      } catch {
        outcome = 'retry';
      }

      switch (outcome) {
        case 'done':
          processed++;
          this.reserved--;
          break;
        case 'discard':
          discarded++;
          this.reserved--;
          break;
        case 'retry':
          retry.push({ ...action, attempts: action.attempts + 1 });
          break;
      }
    }

    this.reserved -= retry.length;
    this.items = [...retry, ...this.items];
    this.emit();
    return { processed, discarded, remaining: retry.length };
  }

  clear(): void {
    this.items = [];
    this.emit();
  }

  destroy(): void {
    this.items = [];
    this.queueSubject.complete();
  }

  private emit(): void {
    this.queueSubject.next(this.snapshot());
  }
}

export function createOfflineActionQueue(options?: OfflineActionQueueOptions): OfflineActionQueue {
  return new OfflineActionQueue(options);
}
