import type { ConfigProvider, DeviceTarget, NotificationSink } from '@tvlink/models';
import { ConfigError } from '../errors/config-error.js';
import { logEvent } from '../logger.js';
import { createNotification, deliver } from '../notifications/index.js';

/**
 * Loads the device target, turning a config fault into one critical
 * notification. Callers must not attempt any command when this returns
 * `undefined`.
 * @param provider - Source of the device target
 * @param sink - Where the failure notification goes
 * @param title - Notification title
 * @throws Errors other than {@link ConfigError}
 * @public
 */
export async function loadConfigOrNotify(
  provider: ConfigProvider,
  sink: NotificationSink,
  title: string,
): Promise<DeviceTarget | undefined> {
  try {
    const target = await provider.load();
    logEvent('debug', 'config:loaded', { address: target.address, name: target.name });
    return target;
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    logEvent('warn', 'config:failed', error.toJSON());
    deliver(sink, createNotification(title, `Config error: ${error.message}`, 'critical'));
    return undefined;
  }
}
