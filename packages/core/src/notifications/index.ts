import type { Notification, NotificationSink, Urgency } from '@tvlink/models';
import { logEvent } from '../logger.js';

/**
 * Builds a notification with the desktop defaults (normal urgency, 2 s).
 * @public
 */
export function createNotification(
  title: string,
  message: string,
  urgency: Urgency = 'normal',
  timeoutMs = 2000,
  icon?: string,
): Notification {
  return icon ? { title, message, urgency, timeoutMs, icon } : { title, message, urgency, timeoutMs };
}

/**
 * Delivers a notification without letting a misbehaving sink break the
 * caller's control flow.
 * @internal
 */
export function deliver(sink: NotificationSink, notification: Notification): void {
  try {
    sink.notify(notification);
  } catch (error) {
    logEvent('warn', 'notify:failed', {
      title: notification.title,
      message: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Creates the `onRetry` callback that tells the user a reconnect is under
 * way. The callback receives the zero-based index of the attempt about to
 * start and shows it one-based.
 * @param sink - Where to send the notification
 * @param title - Notification title, e.g. "TV Brightness"
 * @param maxAttempts - Total attempts, shown as the denominator
 * @public
 */
export function createRetryNotifier(
  sink: NotificationSink,
  title: string,
  maxAttempts: number,
): (attempt: number) => void {
  return (attempt) => {
    deliver(
      sink,
      createNotification(
        title,
        `Reconnecting to TV... (attempt ${attempt + 1}/${maxAttempts})`,
        'low',
        1500,
      ),
    );
  };
}

/**
 * Keeps notifications in memory. Used by tests and by callers that want
 * to inspect what would have been shown.
 * @public
 */
export class MemoryNotificationSink implements NotificationSink {
  public readonly notifications: Notification[] = [];

  public notify(notification: Notification): void {
    this.notifications.push(notification);
  }

  public clear(): void {
    this.notifications.length = 0;
  }
}
