/**
 * Command and result types exchanged with the device.
 */

/**
 * A single request sent to the device once the registration handshake
 * has completed.
 */
export interface DeviceCommand {
  readonly type: 'request';
  readonly id: string;
  readonly uri: string;
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * Payload the device returns inside a `response` message.
 */
export type ResponsePayload = Record<string, unknown>;

export interface CommandSuccess<T> {
  ok: true;
  payload: T;
}

export interface CommandFailure {
  ok: false;
  error: string;
}

/**
 * Outcome of one command. Exactly one of `payload` or `error` is present.
 */
export type CommandResult<T = ResponsePayload> = CommandSuccess<T> | CommandFailure;

/**
 * Anything that can run one command and report why it failed.
 */
export interface CommandSession {
  execute(command: DeviceCommand): Promise<CommandResult>;
  readonly lastError?: string;
}
