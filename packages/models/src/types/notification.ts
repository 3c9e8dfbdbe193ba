export type Urgency = 'low' | 'normal' | 'critical';

/**
 * A user-facing message delivered through a {@link NotificationSink}.
 */
export interface Notification {
  title: string;
  message: string;
  urgency: Urgency;
  /** How long the notification stays visible, in milliseconds */
  timeoutMs: number;
  icon?: string;
}

/**
 * Fire-and-forget delivery of notifications.
 *
 * Implementations must not throw back into the caller and must not block
 * for any meaningful time.
 */
export interface NotificationSink {
  notify(notification: Notification): void;
}
