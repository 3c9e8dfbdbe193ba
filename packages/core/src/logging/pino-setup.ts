/**
 * Pino logger setup with redaction of pairing keys
 */

import pino from 'pino';

/**
 * Options shared by every logger: silent until raised, with the pairing
 * key censored. It travels as `client-key` in the register message and as
 * `key` in the config file.
 * @public
 */
export const loggerOptions: pino.LoggerOptions = {
  level: 'silent',
  redact: {
    paths: ['key', '*.key', 'payload["client-key"]', 'message.payload["client-key"]'],
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
};

/**
 * Root logger for console diagnostics.
 *
 * Written to stderr, so the CLI's stdout carries only command output;
 * `--verbose` raises the level.
 *
 * @example
 * ```typescript
 * rootLogger.level = 'debug';
 * rootLogger.debug({ target: { address: '192.168.1.40', key: 'test-key' } }, 'loaded');
 * // key is printed as [REDACTED]
 * ```
 *
 * @public
 */
const rootLogger = pino(loggerOptions, pino.destination(2));

/**
 * Returns a child logger tagged with a component name.
 * @param component - Name shown in the `component` field
 * @public
 */
export function createComponentLogger(component: string): pino.Logger {
  return rootLogger.child({ component });
}

export { rootLogger };
