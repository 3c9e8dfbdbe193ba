/**
 * Failure kinds a device session can run into
 */
export enum SessionErrorCode {
  CONNECTION_FAILED = 'connection_failed',
  CONNECTION_CLOSED = 'connection_closed',
  RESPONSE_TIMEOUT = 'response_timeout',
  PROTOCOL_ERROR = 'protocol_error',
  SESSION_REUSED = 'session_reused',
}

/**
 * Error raised inside a session. The session converts it into a failed
 * command result at its boundary; the message is what the retry logic and
 * the user see.
 */
export class SessionError extends Error {
  public readonly code: SessionErrorCode;
  public readonly cause?: Error;

  public constructor(message: string, code: SessionErrorCode, cause?: Error) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
    this.cause = cause;

    Object.setPrototypeOf(this, SessionError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause?.message,
    };
  }

  public static connectionFailed(cause: Error): SessionError {
    return new SessionError(cause.message, SessionErrorCode.CONNECTION_FAILED, cause);
  }

  public static connectionClosed(code: number): SessionError {
    return new SessionError(
      `Connection closed before a response was received (code ${code})`,
      SessionErrorCode.CONNECTION_CLOSED,
    );
  }

  public static responseTimeout(timeoutMs: number): SessionError {
    return new SessionError(
      `Response wait timed out after ${timeoutMs}ms`,
      SessionErrorCode.RESPONSE_TIMEOUT,
    );
  }

  public static rejected(text: string): SessionError {
    return new SessionError(text, SessionErrorCode.PROTOCOL_ERROR);
  }

  public static reused(): SessionError {
    return new SessionError('Session already used', SessionErrorCode.SESSION_REUSED);
  }
}
