import { execFile } from 'child_process';
import { SUBPROCESS_TIMEOUT_MS, logEvent } from '@tvlink/core';
import type { Notification, NotificationSink } from '@tvlink/models';

/**
 * Builds the `notify-send` argument list for a notification.
 * @internal
 */
export function buildNotifySendArgs(notification: Notification): string[] {
  const args = ['-u', notification.urgency, '-t', String(notification.timeoutMs)];
  if (notification.icon) {
    args.push('-i', notification.icon);
  }
  args.push(notification.title, notification.message);
  return args;
}

/**
 * Shows notifications through `notify-send`.
 *
 * Fire-and-forget: the child process is not awaited, and failures (missing
 * binary, no notification daemon, timeout) are logged and dropped.
 * @public
 */
export class DesktopNotifier implements NotificationSink {
  public constructor(
    private readonly command = 'notify-send',
    private readonly timeoutMs = SUBPROCESS_TIMEOUT_MS,
  ) {}

  public notify(notification: Notification): void {
    const args = buildNotifySendArgs(notification);
    try {
      execFile(this.command, args, { timeout: this.timeoutMs }, (error) => {
        if (error) {
          logEvent('warn', 'notify:failed', { command: this.command, message: error.message });
        }
      });
    } catch (error) {
      logEvent('warn', 'notify:failed', {
        command: this.command,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
