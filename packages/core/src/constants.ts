/**
 * Timing and network defaults for talking to the TV.
 */

/** TLS WebSocket port of the webOS remote service */
export const DEVICE_TLS_PORT = 3001;

/** Bound on TCP connect plus TLS and WebSocket upgrade */
export const HANDSHAKE_TIMEOUT_MS = 3000;

/** Bound on the wait for a terminal message once the socket is open */
export const RESPONSE_TIMEOUT_MS = 2000;

// After idle or reboot the TV answers the first connection(s) with TLS
// errors; two or three tries with a short pause get through.
export const RETRY_ATTEMPTS = 3;
export const RETRY_BASE_DELAY_MS = 500;

/** "Connecting to TV..." is shown once an operation takes longer than this */
export const SLOW_CONNECT_THRESHOLD_MS = 1000;

export const SUBPROCESS_TIMEOUT_MS = 5000;

export const DEFAULT_NOTIFICATION_TITLE = 'LG TV';
