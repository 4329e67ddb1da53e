/**
 * Engine configuration.
 *
 * One resolved, frozen config is built when the worker script loads and is
 * passed explicitly to every component. The active cache namespace is
 * derived from it and never stored in a mutable global.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigError } from '../errors/engine-error.js';

export const DEFAULT_PRECACHE_URLS = [
  '/',
  '/static/icon-192.png',
  '/static/icon-512.png',
  '/manifest.json',
  'https://cdnjs.cloudflare.com/ajax/libs/socket.io/4.7.2/socket.io.js',
] as const;

const notificationSchema = z.object({
  title: z.string().min(1).default('Attendance Tracker'),
  defaultBody: z.string().default('Attendance reminder'),
  icon: z.string().default('/static/icon-192.png'),
  badge: z.string().default('/static/icon-72.png'),
  actionIcon: z.string().default('/static/icon-96.png'),
  vibrate: z.array(z.number().int().nonnegative()).default([100, 50, 100]),
  primaryKey: z.string().min(1).default('attendance-notification'),
});

const offlineActionRouteSchema = z.object({
  method: z
    .string()
    .transform((method) => method.toUpperCase())
    .pipe(z.enum(['POST', 'PUT', 'PATCH', 'DELETE'])),
  path: z.string().startsWith('/'),
});

export const engineConfigSchema = z.object({
  /** Cache name prefix shared by every version of the app */
  cacheName: z
    .string()
    .regex(/^[a-z0-9][a-z0-9._-]*$/i, 'must be alphanumeric with . _ or -')
    .default('attendance-tracker'),
  /** Bumping the version invalidates every previously cached entry */
  version: z.string().min(1).default('v1.0.0'),
  /** Paths under this prefix are handled network-first */
  apiPrefix: z.string().startsWith('/').default('/api/'),
  /** Document served to offline navigations */
  rootDocument: z.string().startsWith('/').default('/'),
  precacheUrls: z.array(z.string().min(1)).min(1).default([...DEFAULT_PRECACHE_URLS]),
  syncTag: z.string().min(1).default('attendance-sync'),
  /** Action routes queued for background sync when the network is down */
  offlineActions: z.array(offlineActionRouteSchema).default([
    { method: 'POST', path: '/api/checkin' },
    { method: 'POST', path: '/api/checkout' },
  ]),
  maxPendingActions: z.number().int().positive().default(100),
  notification: notificationSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/** Configuration accepted by {@link resolveEngineConfig}; every field is optional */
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/** Fully resolved engine configuration */
export type EngineConfig = Readonly<z.output<typeof engineConfigSchema>>;

export type NotificationConfig = EngineConfig['notification'];

export type OfflineActionRoute = EngineConfig['offlineActions'][number];

/**
 * Apply defaults and validate. Throws {@link ConfigError} listing every
 * invalid field.
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return Object.freeze(result.data);
}

/** Name of the cache namespace owned by this version, e.g. `attendance-tracker-v1.0.0` */
export function cacheNamespace(config: Pick<EngineConfig, 'cacheName' | 'version'>): string {
  return `${config.cacheName}-${config.version}`;
}
