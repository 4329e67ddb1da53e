import {
  NotificationError,
  type EngineLogger,
  type NotificationConfig,
  silentLogger,
} from '@offline-attendance/core';
import type {
  ClickedNotification,
  NavigationIntent,
  NotificationActionId,
  NotificationRequest,
  NotificationSurface,
  PushPayload,
  WindowClients,
} from './types.js';

/** Query value each notification action puts on the opened page */
const ACTION_QUERY: Record<NotificationActionId, string> = {
  'check-in': 'checkin',
  'check-out': 'checkout',
};

const ACTION_TITLES: Record<NotificationActionId, string> = {
  'check-in': 'Check In',
  'check-out': 'Check Out',
};

const NOTIFICATION_ACTIONS: readonly NotificationActionId[] = ['check-in', 'check-out'];

export interface PushDispatcherOptions {
  notification: NotificationConfig;
  surface: NotificationSurface;
  clients: Pick<WindowClients, 'openWindow'>;
  /** Page opened by notification clicks */
  rootDocument: string;
  logger?: EngineLogger;
  now?: () => number;
}

function isNotificationAction(action: string): action is NotificationActionId {
  return Object.hasOwn(ACTION_QUERY, action);
}

/**
 * Shows attendance reminders for push messages and turns clicks on them into
 * navigation intents.
 */
export class PushDispatcher {
  private readonly notification: NotificationConfig;
  private readonly surface: NotificationSurface;
  private readonly clients: Pick<WindowClients, 'openWindow'>;
  private readonly rootDocument: string;
  private readonly logger: EngineLogger;
  private readonly now: () => number;

  constructor(options: PushDispatcherOptions) {
    this.notification = options.notification;
    this.surface = options.surface;
    this.clients = options.clients;
    this.rootDocument = options.rootDocument;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  buildNotification(payload: PushPayload | null): NotificationRequest {
    const { title, defaultBody, icon, badge, actionIcon, vibrate, primaryKey } = this.notification;
    const actions = NOTIFICATION_ACTIONS.map((action) => ({
      action,
      title: ACTION_TITLES[action],
      icon: actionIcon,
    }));

    return {
      title,
      options: {
        body: payload ? payload.text() : defaultBody,
        icon,
        badge,
        vibrate: [...vibrate],
        data: {
          dateOfArrival: this.now(),
          primaryKey,
        },
        actions,
      },
    };
  }

  /**
   * Display the reminder. The returned promise must be handed to the push
   * event's keep-alive so the worker is not suspended before it resolves.
   */
  async handlePush(payload: PushPayload | null): Promise<NotificationRequest> {
    const request = this.buildNotification(payload);
    try {
      await this.surface.showNotification(request.title, request.options);
    } catch (error) {
      throw new NotificationError(
        'OFFLINE_P700',
        `Could not display "${request.title}"`,
        { body: request.options.body },
        error instanceof Error ? error : undefined,
      );
    }
    this.logger.debug('Displayed notification', { body: request.options.body });
    return request;
  }

  /** The single page a click on `action` leads to; `''` is a body click */
  resolveIntent(action: string): NavigationIntent {
    if (isNotificationAction(action)) {
      return { url: `${this.rootDocument}?action=${ACTION_QUERY[action]}`, action };
    }
    return { url: this.rootDocument, action: null };
  }

  async handleNotificationClick(
    notification: ClickedNotification,
    action: string,
  ): Promise<NavigationIntent> {
    notification.close();

    const intent = this.resolveIntent(action);
    this.logger.info('Notification click received', { action: action || null, url: intent.url });

    try {
      await this.clients.openWindow(intent.url);
    } catch (error) {
      throw new NotificationError(
        'OFFLINE_P701',
        `Could not open ${intent.url}`,
        { url: intent.url },
        error instanceof Error ? error : undefined,
      );
    }
    return intent;
  }
}

export function createPushDispatcher(options: PushDispatcherOptions): PushDispatcher {
  return new PushDispatcher(options);
}
