export {
  DEFAULT_PRECACHE_URLS,
  cacheNamespace,
  engineConfigSchema,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
  type NotificationConfig,
  type OfflineActionRoute,
} from './engine-config.js';
