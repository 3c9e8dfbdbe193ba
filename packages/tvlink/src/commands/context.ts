import {
  RETRY_ATTEMPTS,
  RetryOrchestrator,
  createRetryNotifier,
  loadConfigOrNotify,
  type SessionOperation,
} from '@tvlink/core';
import type {
  CommandResult,
  CommandSession,
  ConfigProvider,
  DeviceTarget,
  NotificationSink,
  RetryConfig,
} from '@tvlink/models';

/**
 * Collaborators a CLI command runs with. The CLI wires the real ones;
 * tests pass fakes.
 */
export interface CommandContext {
  provider: ConfigProvider;
  notifier: NotificationSink;
  title: string;
  createSession: (target: DeviceTarget) => CommandSession;
  retry?: RetryConfig & { sleep?: (ms: number) => Promise<void> };
}

/**
 * Loads the device target and runs the operation with retries.
 *
 * A config fault ends the call before any connection is made; its
 * notification has already been shown.
 * @param context - Collaborators
 * @param operation - Device operation run once per attempt
 * @param errorMessage - Final notification text when no error was recorded
 */
export async function runDeviceOperation<T>(
  context: CommandContext,
  operation: SessionOperation<T>,
  errorMessage: string,
): Promise<CommandResult<T>> {
  const target = await loadConfigOrNotify(context.provider, context.notifier, context.title);
  if (!target) {
    return { ok: false, error: 'Config error' };
  }

  const maxAttempts = context.retry?.maxAttempts ?? RETRY_ATTEMPTS;
  const orchestrator = new RetryOrchestrator({
    ...context.retry,
    maxAttempts,
    createSession: () => context.createSession(target),
    notifier: context.notifier,
    title: context.title,
    errorMessage,
    onRetry: createRetryNotifier(context.notifier, context.title, maxAttempts),
  });

  const { result } = await orchestrator.run(operation);
  return result;
}
