import { appendFileSync, mkdirSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const LOG_DIR = process.env.TVLINK_LOG_DIR || resolve(__dirname, '../.logs');

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Reads the current log level from TVLINK_LOG_LEVEL.
 * Defaults to 'info' if not set or invalid.
 * @internal
 */
function currentLevel(): LogLevel {
  const env = (process.env.TVLINK_LOG_LEVEL || '').toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

function enabled(min: LogLevel): boolean {
  return LEVELS[currentLevel()] >= LEVELS[min];
}

/**
 * Stable per-process run identifier so events from one CLI invocation can
 * be correlated.
 * @internal
 */
function runId(): string {
  if (!process.env.TVLINK_RUN_ID) {
    process.env.TVLINK_RUN_ID = `${Date.now()}-${process.pid}`;
  }
  return process.env.TVLINK_RUN_ID;
}

function logFile(): string {
  return resolve(LOG_DIR, `run-${runId()}.jsonl`);
}

/**
 * Writes a structured log event to the JSON Lines log file.
 *
 * Enabled by TVLINK_LOG=1 (or `true`), filtered by TVLINK_LOG_LEVEL.
 * Error-level events are always written.
 * @param level - Log severity level
 * @param event - Event identifier, e.g. `session:connecting`
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  const loggingEnabled =
    process.env.TVLINK_LOG === '1' || process.env.TVLINK_LOG === 'true' || level === 'error';
  if (!loggingEnabled) return;

  if (level !== 'error' && !enabled(level)) return;

  const entry = {
    ts: new Date().toISOString(),
    pid: process.pid,
    level,
    event,
    data,
  };
  try {
    mkdirSync(LOG_DIR, { recursive: true });
    appendFileSync(logFile(), JSON.stringify(entry) + '\n', {
      encoding: 'utf8',
    });
  } catch (error) {
    // The log file is best effort; fall back to stderr
    console.error(`[tvlink] failed to write log event ${event}:`, error);
  }
}

/**
 * Logs an error event with message, stack, code and process context.
 * @param context - Label identifying where the error occurred
 * @param rawError - The thrown value
 * @param extra - Additional structured context
 * @public
 */
export function logError(context: string, rawError: unknown, extra?: unknown): void {
  const err = rawError instanceof Error ? rawError : undefined;
  const code =
    typeof rawError === 'object' && rawError !== null && 'code' in rawError
      ? rawError.code
      : undefined;
  logEvent('error', `error:${context}`, {
    message: err?.message ?? String(rawError),
    stack: err?.stack,
    code,
    extra,
    argv: process.argv,
    cwd: process.cwd(),
  });
}
