/**
 * Logging infrastructure exports
 *
 * JSON Lines event log for post-mortem debugging, plus a pino logger with
 * key redaction for console diagnostics.
 */

export { rootLogger, createComponentLogger, loggerOptions } from './pino-setup.js';

export { logEvent, logError } from '../logger.js';
export type { LogLevel } from '../logger.js';
