import Emittery from 'emittery';
import WebSocket, { type ClientOptions } from 'ws';
import {
  SessionState,
  canTransition,
  type CommandResult,
  type CommandSession,
  type DeviceCommand,
  type DeviceTarget,
  type ResponsePayload,
} from '@tvlink/models';
import { DeviceMessageSchema, type DeviceMessage } from '@tvlink/schemas';
import {
  DEVICE_TLS_PORT,
  HANDSHAKE_TIMEOUT_MS,
  RESPONSE_TIMEOUT_MS,
} from '../constants.js';
import { SessionError } from '../errors/session-error.js';
import { logError, logEvent } from '../logger.js';
import { buildRegisterMessage, type RegisterPayload } from './registration.js';

/**
 * Creates the socket for one session. Tests pass an in-process fake.
 * @public
 */
export type WebSocketFactory = (url: string, options: ClientOptions) => WebSocket;

export interface DeviceSessionOptions {
  /** Device port (default: 3001) */
  port?: number;
  /** Bound on connect plus TLS and WebSocket upgrade, in ms (default: 3000) */
  handshakeTimeoutMs?: number;
  /** Bound on the wait for a terminal message once open, in ms (default: 2000) */
  responseTimeoutMs?: number;
  /** How long to wait for the close handshake before dropping the socket, in ms (default: 500) */
  closeTimeoutMs?: number;
  /** Override for the pairing manifest sent with the register message */
  registerPayload?: RegisterPayload;
  createSocket?: WebSocketFactory;
}

export interface SessionStateChange {
  from: SessionState;
  to: SessionState;
}

interface DeviceSessionEvents {
  stateChange: SessionStateChange;
}

const defaultSocketFactory: WebSocketFactory = (url, options) => new WebSocket(url, options);

/**
 * Decodes a frame into text. Fragmented and ArrayBuffer frames are joined
 * or wrapped before decoding.
 * @internal
 */
function frameToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

function formatHost(address: string): string {
  return address.includes(':') && !address.startsWith('[') ? `[${address}]` : address;
}

/**
 * One-shot connection to the TV.
 *
 * Opens a TLS WebSocket, performs the register handshake with the pairing
 * key, sends exactly one command and resolves with exactly one terminal
 * result. The TV closes its side after each operation, so a session cannot
 * be reused: a second {@link DeviceSession.execute} call fails without
 * touching the network.
 *
 * The session owns its socket and listens to it rather than extending a
 * socket class. The socket is released on every exit path.
 * @example
 * ```typescript
 * const session = new DeviceSession({ address: '192.168.1.40', key: 'test-key' });
 * const result = await session.execute({
 *   type: 'request',
 *   id: 'get_1',
 *   uri: 'ssap://settings/getSystemSettings',
 *   payload: { category: 'picture', keys: ['backlight'] },
 * });
 * if (result.ok) console.info(result.payload);
 * ```
 * @public
 */
export class DeviceSession implements CommandSession {
  private currentState = SessionState.New;
  private error?: string;
  private used = false;
  private responseTimer?: NodeJS.Timeout;
  private readonly emitter = new Emittery<DeviceSessionEvents>();
  private readonly config: {
    port: number;
    handshakeTimeoutMs: number;
    responseTimeoutMs: number;
    closeTimeoutMs: number;
  };
  private readonly createSocket: WebSocketFactory;
  private readonly registerPayload?: RegisterPayload;

  public constructor(
    private readonly target: DeviceTarget,
    options: DeviceSessionOptions = {},
  ) {
    this.config = {
      port: options.port ?? DEVICE_TLS_PORT,
      handshakeTimeoutMs: options.handshakeTimeoutMs ?? HANDSHAKE_TIMEOUT_MS,
      responseTimeoutMs: options.responseTimeoutMs ?? RESPONSE_TIMEOUT_MS,
      closeTimeoutMs: options.closeTimeoutMs ?? 500,
    };
    this.createSocket = options.createSocket ?? defaultSocketFactory;
    this.registerPayload = options.registerPayload;
  }

  public get state(): SessionState {
    return this.currentState;
  }

  /** Error description of the failed command, if any */
  public get lastError(): string | undefined {
    return this.error;
  }

  public get url(): string {
    return `wss://${formatHost(this.target.address)}:${this.config.port}/`;
  }

  /**
   * Subscribes to state transitions.
   * @returns Unsubscribe function
   */
  public onStateChange(handler: (change: SessionStateChange) => void): () => void {
    return this.emitter.on('stateChange', handler);
  }

  /**
   * Sends one command and waits for its terminal message.
   *
   * Never rejects: connection errors, device rejections, timeouts and thrown
   * errors all come back as a failed {@link CommandResult}.
   * @param command - Request to send once registered
   */
  public async execute(command: DeviceCommand): Promise<CommandResult> {
    if (this.used) {
      return { ok: false, error: SessionError.reused().message };
    }
    this.used = true;

    let ws: WebSocket | undefined;
    try {
      this.transition(SessionState.Connecting);
      logEvent('debug', 'session:connecting', { url: this.url, command: command.uri });

      // The TV presents a self-signed certificate that cannot be verified,
      // so certificate checks are off for this connection only.
      ws = this.createSocket(this.url, {
        rejectUnauthorized: false,
        handshakeTimeout: this.config.handshakeTimeoutMs,
      });

      const payload = await this.awaitTerminal(ws, command);
      this.transition(SessionState.Done);
      logEvent('debug', 'session:response', { id: command.id });
      return { ok: true, payload };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.error = message;
      this.transition(SessionState.Failed);
      logEvent('debug', 'session:failed', {
        id: command.id,
        error: message,
        code: error instanceof SessionError ? error.code : undefined,
      });
      return { ok: false, error: message };
    } finally {
      if (ws) {
        await this.release(ws);
      }
    }
  }

  private awaitTerminal(ws: WebSocket, command: DeviceCommand): Promise<ResponsePayload> {
    return new Promise<ResponsePayload>((resolve, reject) => {
      const send = (message: object) => {
        ws.send(JSON.stringify(message), (error) => {
          if (error) {
            reject(SessionError.connectionFailed(error));
          }
        });
      };

      ws.on('open', () => {
        this.responseTimer = setTimeout(() => {
          reject(SessionError.responseTimeout(this.config.responseTimeoutMs));
        }, this.config.responseTimeoutMs);

        try {
          send(buildRegisterMessage(this.target.key, this.registerPayload));
        } catch (error) {
          reject(error);
        }
      });

      ws.on('message', (data) => {
        const message = this.parseMessage(data);
        if (!message) return;

        switch (message.type) {
          case 'registered':
            if (!canTransition(this.currentState, SessionState.Registered)) return;
            this.transition(SessionState.Registered);
            logEvent('debug', 'session:registered', { url: this.url });
            try {
              send(command);
              this.transition(SessionState.AwaitingResponse);
            } catch (error) {
              reject(error);
            }
            return;
          case 'response': {
            const { payload } = message;
            if (payload.returnValue === false) {
              reject(
                SessionError.rejected(
                  typeof payload.errorText === 'string' ? payload.errorText : 'Unknown error',
                ),
              );
            } else {
              resolve(payload);
            }
            return;
          }
          case 'error':
            reject(SessionError.rejected(message.error ?? 'Unknown error'));
            return;
        }
      });

      ws.on('error', (error) => {
        reject(SessionError.connectionFailed(error));
      });

      ws.on('close', (code) => {
        reject(SessionError.connectionClosed(code));
      });
    });
  }

  private parseMessage(data: WebSocket.RawData): DeviceMessage | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(frameToText(data));
    } catch (error) {
      logEvent('warn', 'session:unparseable-frame', {
        message: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const parsed = DeviceMessageSchema.safeParse(raw);
    if (!parsed.success) {
      logEvent('debug', 'session:ignored-message', { message: raw });
      return undefined;
    }
    return parsed.data;
  }

  /**
   * Detaches listeners and closes the socket. Waits for the close handshake
   * up to `closeTimeoutMs`, then drops the connection.
   */
  private async release(ws: WebSocket): Promise<void> {
    clearTimeout(this.responseTimer);
    this.responseTimer = undefined;

    ws.removeAllListeners();
    ws.on('error', (error) => {
      logEvent('debug', 'session:error-after-release', { message: error.message });
    });

    try {
      if (ws.readyState === ws.CLOSED) return;
      if (ws.readyState !== ws.OPEN) {
        ws.terminate();
        return;
      }

      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          ws.terminate();
          resolve();
        }, this.config.closeTimeoutMs);
        ws.once('close', () => {
          clearTimeout(timer);
          resolve();
        });
        ws.close(1000, 'Command complete');
      });
    } catch (error) {
      logError('session:release', error, { url: this.url });
    }
  }

  private transition(to: SessionState): void {
    const from = this.currentState;
    if (!canTransition(from, to)) {
      logEvent('warn', 'session:invalid-transition', { from, to });
      return;
    }
    this.currentState = to;
    this.emitter.emit('stateChange', { from, to }).catch((error: unknown) => {
      logError('session:state-listener', error);
    });
  }
}
