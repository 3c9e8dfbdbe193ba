export {
  DeviceSession,
  type DeviceSessionOptions,
  type SessionStateChange,
  type WebSocketFactory,
} from './device-session.js';
export {
  buildRegisterMessage,
  loadRegisterPayload,
  type RegisterMessage,
  type RegisterPayload,
} from './registration.js';
