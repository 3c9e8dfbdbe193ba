import { setTimeout as delay } from 'node:timers/promises';
import type {
  CommandResult,
  CommandSession,
  NotificationSink,
  RetryConfig,
  RetryContext,
  RetryOutcome,
} from '@tvlink/models';
import { RetryOptionsSchema } from '@tvlink/schemas';
import {
  DEFAULT_NOTIFICATION_TITLE,
  RETRY_ATTEMPTS,
  RETRY_BASE_DELAY_MS,
  SLOW_CONNECT_THRESHOLD_MS,
} from '../constants.js';
import { isRetryable } from '../error-classifier/index.js';
import { logError, logEvent } from '../logger.js';
import { createComponentLogger } from '../logging/pino-setup.js';
import { createNotification, deliver } from '../notifications/index.js';
import { SlowConnectionWatchdog } from '../watchdog/index.js';

/**
 * Runs one domain operation against a fresh session.
 * @public
 */
export type SessionOperation<T, S extends CommandSession = CommandSession> = (
  session: S,
) => Promise<CommandResult<T>>;

export type WatchdogFactory = (
  thresholdMs: number,
  onSlow: () => void,
) => SlowConnectionWatchdog;

export interface RetryOrchestratorOptions<S extends CommandSession = CommandSession>
  extends RetryConfig {
  /** Creates a fresh session for every attempt */
  createSession: () => S;
  notifier: NotificationSink;
  /** Notification title (default: "LG TV") */
  title?: string;
  /** Final notification text when no error text was recorded */
  errorMessage?: string;
  /** Called before each retry with the zero-based index of the next attempt */
  onRetry?: (attempt: number) => void;
  /** Classifies failures as transient (default: {@link isRetryable}) */
  classify?: (errorText: string | undefined) => boolean;
  sleep?: (ms: number) => Promise<void>;
  createWatchdog?: WatchdogFactory;
}

const log = createComponentLogger('retry');

/**
 * Runs a device operation with retries for transient transport faults.
 *
 * Each attempt gets a fresh session because the TV's connection is
 * single-use. Failures the classifier deems permanent end the loop at
 * once. Between attempts the orchestrator waits `baseDelayMs * n` after
 * the n-th attempt: the stall being waited out is the TV waking up, which
 * takes a roughly fixed time, so the delay grows linearly.
 *
 * A watchdog shows "Connecting to TV..." once the whole operation takes
 * longer than `slowThresholdMs`. After that, per-retry "Reconnecting"
 * notifications are suppressed. A failed call produces exactly one
 * critical notification carrying the last error.
 * @example
 * ```typescript
 * const orchestrator = new RetryOrchestrator({
 *   createSession: () => new DeviceSession(target),
 *   notifier: new DesktopNotifier(),
 *   title: 'TV Brightness',
 * });
 * const { result } = await orchestrator.run((session) =>
 *   getSystemSetting(session, 'picture', 'backlight'),
 * );
 * ```
 * @public
 */
export class RetryOrchestrator<S extends CommandSession = CommandSession> {
  private readonly config: {
    maxAttempts: number;
    baseDelayMs: number;
    slowThresholdMs: number;
  };
  private readonly title: string;
  private readonly errorMessage: string;
  private readonly classify: (errorText: string | undefined) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly createWatchdog: WatchdogFactory;

  public constructor(private readonly options: RetryOrchestratorOptions<S>) {
    const validated = RetryOptionsSchema.parse({
      maxAttempts: options.maxAttempts,
      baseDelayMs: options.baseDelayMs,
      slowThresholdMs: options.slowThresholdMs,
    });
    this.config = {
      maxAttempts: validated.maxAttempts ?? RETRY_ATTEMPTS,
      baseDelayMs: validated.baseDelayMs ?? RETRY_BASE_DELAY_MS,
      slowThresholdMs: validated.slowThresholdMs ?? SLOW_CONNECT_THRESHOLD_MS,
    };
    this.title = options.title ?? DEFAULT_NOTIFICATION_TITLE;
    this.errorMessage = options.errorMessage ?? 'Command failed';
    this.classify = options.classify ?? isRetryable;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.createWatchdog =
      options.createWatchdog ??
      ((thresholdMs, onSlow) => new SlowConnectionWatchdog(thresholdMs, onSlow));
  }

  public get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Delay before the attempt following `attemptIndex` (zero-based).
   */
  public delayAfter(attemptIndex: number): number {
    return this.config.baseDelayMs * (attemptIndex + 1);
  }

  /**
   * Runs the operation until it succeeds, fails permanently, or attempts
   * run out.
   * @param operation - Domain operation, called once per attempt
   * @returns Final result with attempt count and whether the slow notice fired
   */
  public async run<T>(operation: SessionOperation<T, S>): Promise<RetryOutcome<T>> {
    const context: RetryContext = {
      attemptIndex: 0,
      maxAttempts: this.config.maxAttempts,
      lastError: undefined,
      slowNotified: false,
    };

    const watchdog = this.createWatchdog(this.config.slowThresholdMs, () => {
      deliver(this.options.notifier, createNotification(this.title, 'Connecting to TV...', 'low', 1500));
    });
    watchdog.arm();

    let attempts = 0;
    let success: CommandResult<T> | undefined;

    try {
      for (; context.attemptIndex < context.maxAttempts; context.attemptIndex++) {
        const session = this.options.createSession();
        attempts++;
        logEvent('debug', 'retry:attempt', { ...context });

        const result = await this.invoke(operation, session);
        if (result.ok) {
          success = result;
          break;
        }

        context.lastError = result.error || session.lastError;
        if (!this.classify(context.lastError)) {
          log.debug({ error: context.lastError }, 'permanent failure, not retrying');
          break;
        }

        if (context.attemptIndex < context.maxAttempts - 1) {
          context.slowNotified = watchdog.fired;
          if (!context.slowNotified) {
            this.options.onRetry?.(context.attemptIndex + 1);
          }
          const wait = this.delayAfter(context.attemptIndex);
          logEvent('debug', 'retry:backoff', { attemptIndex: context.attemptIndex, wait });
          await this.sleep(wait);
        }
      }
    } finally {
      watchdog.cancel();
    }

    context.slowNotified = watchdog.fired;

    if (success) {
      return { result: success, attempts, slowNotified: context.slowNotified };
    }

    const message = context.lastError || this.errorMessage;
    logEvent('info', 'retry:exhausted', { ...context, attempts });
    deliver(this.options.notifier, createNotification(this.title, message, 'critical'));
    return {
      result: { ok: false, error: message },
      attempts,
      slowNotified: context.slowNotified,
    };
  }

  private async invoke<T>(
    operation: SessionOperation<T, S>,
    session: S,
  ): Promise<CommandResult<T>> {
    try {
      return await operation(session);
    } catch (error) {
      logError('retry:operation', error);
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}

/**
 * Runs an operation with retries and returns its payload, or `undefined`
 * when it ultimately failed. Details of the failure reach the user through
 * the final notification; use {@link RetryOrchestrator.run} for them in code.
 * @public
 */
export async function withRetry<T, S extends CommandSession = CommandSession>(
  operation: SessionOperation<T, S>,
  options: RetryOrchestratorOptions<S>,
): Promise<T | undefined> {
  const { result } = await new RetryOrchestrator(options).run(operation);
  return result.ok ? result.payload : undefined;
}
