import type { CommandResult } from './command.js';

/**
 * Per-call bookkeeping of the retry orchestrator. Created for one top-level
 * call and discarded afterwards.
 */
export interface RetryContext {
  attemptIndex: number;
  maxAttempts: number;
  lastError?: string;
  slowNotified: boolean;
}

export interface RetryConfig {
  /** Total attempts including the first one (default: 3) */
  maxAttempts?: number;
  /** Backoff unit in milliseconds; the delay after attempt n is n * baseDelayMs (default: 500) */
  baseDelayMs?: number;
  /** Time before the "still connecting" notification fires (default: 1000) */
  slowThresholdMs?: number;
}

/**
 * Detailed result of an orchestrated operation.
 */
export interface RetryOutcome<T> {
  result: CommandResult<T>;
  /** Number of sessions created */
  attempts: number;
  slowNotified: boolean;
}
