/**
 * @offline-attendance/core - shared foundations for the offline engine
 *
 * Structured logging, the engine error taxonomy and the validated engine
 * configuration used by every `@offline-attendance/pwa` component.
 *
 * @packageDocumentation
 */

// Errors
export * from './errors/index.js';

// Configuration
export * from './config/index.js';

// Observability
export * from './observability/index.js';
