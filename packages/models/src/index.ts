// Command types
export type {
  DeviceCommand,
  ResponsePayload,
  CommandSuccess,
  CommandFailure,
  CommandResult,
  CommandSession,
} from './types/command.js';

// Retry types
export type { RetryContext, RetryConfig, RetryOutcome } from './types/retry.js';

// Collaborators
export type { Urgency, Notification, NotificationSink } from './types/notification.js';
export type { DeviceTarget, ConfigProvider } from './types/config.js';

export { SessionState, isTerminalState, canTransition } from './enums/session-state.js';
