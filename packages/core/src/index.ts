export * from './constants.js';
export * from './errors/index.js';
export * from './session/index.js';
export * from './watchdog/index.js';
export * from './retry/index.js';
export * from './settings/index.js';
export * from './notifications/index.js';
export { loadConfigOrNotify } from './config/load-config.js';
export { isRetryable, RETRYABLE_MARKERS } from './error-classifier/index.js';
export { generateRequestId } from './utils/request/generateRequestId.js';

// Logging with redaction
export * from './logging/index.js';
