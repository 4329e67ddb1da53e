/**
 * Service worker entry point, bundled and served as `/sw.js`.
 */

import { startServiceWorker, type ServiceWorkerScope } from './service-worker.js';

// The DOM library types `self` as a Window; the worker scope is described
// by ServiceWorkerScope instead.
startServiceWorker(globalThis as unknown as ServiceWorkerScope);
