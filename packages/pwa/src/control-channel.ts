import { Subject, type Observable } from 'rxjs';
import { z } from 'zod';
import {
  type EngineError,
  ensureEngineError,
  type EngineLogger,
  silentLogger,
} from '@offline-attendance/core';

export const controlMessageSchema = z.object({
  type: z.literal('SKIP_WAITING'),
});

export type ControlMessage = z.infer<typeof controlMessageSchema>;

/** Where a reported error was caught */
export type ErrorSource =
  | 'install'
  | 'activate'
  | 'fetch'
  | 'sync'
  | 'push'
  | 'notificationclick'
  | 'message'
  | 'error'
  | 'unhandledrejection';

export interface ReportedError {
  source: ErrorSource;
  error: EngineError;
  timestamp: number;
}

export interface ControlChannelOptions {
  /** Called for `SKIP_WAITING` */
  skipWaiting: () => Promise<void>;
  logger?: EngineLogger;
}

/**
 * Administrative messages from the page and the engine's single error sink.
 *
 * Reported errors are observational: they are published and logged, never
 * re-thrown into the event that produced them.
 */
export class ControlChannel {
  private readonly skipWaiting: () => Promise<void>;
  private readonly logger: EngineLogger;
  private readonly messagesSubject = new Subject<ControlMessage>();
  private readonly errorsSubject = new Subject<ReportedError>();

  constructor(options: ControlChannelOptions) {
    this.skipWaiting = options.skipWaiting;
    this.logger = options.logger ?? silentLogger;
  }

  get messages$(): Observable<ControlMessage> {
    return this.messagesSubject.asObservable();
  }

  get errors$(): Observable<ReportedError> {
    return this.errorsSubject.asObservable();
  }

  /**
   * Act on a recognised control message. Resolves `false` for anything
   * else, which is ignored.
   */
  async handleMessage(data: unknown): Promise<boolean> {
    const parsed = controlMessageSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.debug('Ignoring unrecognised message');
      return false;
    }

    this.logger.info('Received skip waiting message');
    this.messagesSubject.next(parsed.data);
    await this.skipWaiting();
    return true;
  }

  reportError(source: ErrorSource, error: unknown): EngineError {
    const engineError = ensureEngineError(
      error,
      source === 'unhandledrejection' ? 'OFFLINE_X901' : 'OFFLINE_X900',
    );
    this.errorsSubject.next({ source, error: engineError, timestamp: Date.now() });
    return engineError;
  }

  dispose(): void {
    this.messagesSubject.complete();
    this.errorsSubject.complete();
  }
}

export function createControlChannel(options: ControlChannelOptions): ControlChannel {
  return new ControlChannel(options);
}
