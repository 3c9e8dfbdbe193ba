import { logEvent } from '../logger.js';

/**
 * One-shot timer that flags an operation as slow.
 *
 * Armed once per top-level operation. If it is still armed when the
 * threshold elapses, `fired` becomes true and then the callback runs;
 * this happens at most once. The owner must call {@link cancel} on every
 * exit path so no late callback fires after the operation has ended.
 * @example
 * ```typescript
 * const watchdog = new SlowConnectionWatchdog(1000, () => notifyConnecting());
 * watchdog.arm();
 * try {
 *   await work();
 * } finally {
 *   watchdog.cancel();
 * }
 * ```
 * @public
 */
export class SlowConnectionWatchdog {
  private timer?: NodeJS.Timeout;
  private armed = false;
  private hasFired = false;

  public constructor(
    private readonly thresholdMs: number,
    private readonly onSlow: () => void,
  ) {}

  /** Whether the threshold elapsed before cancellation */
  public get fired(): boolean {
    return this.hasFired;
  }

  /**
   * Starts the timer. Calling it again, or after cancel, does nothing.
   */
  public arm(): void {
    if (this.armed) return;
    this.armed = true;

    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.hasFired = true;
      logEvent('debug', 'watchdog:fired', { thresholdMs: this.thresholdMs });
      try {
        this.onSlow();
      } catch (error) {
        logEvent('warn', 'watchdog:callback-failed', {
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }, this.thresholdMs);
  }

  /**
   * Stops the timer if it has not fired yet. Safe to call repeatedly.
   */
  public cancel(): void {
    this.armed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
