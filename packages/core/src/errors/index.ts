export { SessionError, SessionErrorCode } from './session-error.js';
export { ConfigError, type ConfigErrorKind } from './config-error.js';
