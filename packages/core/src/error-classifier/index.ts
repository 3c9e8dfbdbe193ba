/**
 * Markers of transient transport faults. The TV produces these while it
 * wakes from idle: TLS alerts, resets, sockets dropped mid-handshake, and
 * our own wait timeouts.
 * @internal
 */
export const RETRYABLE_MARKERS = [
  'SSL',
  'TLS',
  'Connection',
  'ECONNRESET',
  'ECONNREFUSED',
  'socket hang up',
  'EOF',
  'timed out',
  'ETIMEDOUT',
] as const;

/**
 * Whether an error description denotes a transient fault worth retrying.
 *
 * Matching is a case-sensitive substring test against
 * {@link RETRYABLE_MARKERS}. Anything else, such as a device rejection
 * (`Invalid auth`) or a malformed command, is permanent.
 * @param errorText - Error description from a failed session
 * @public
 */
export function isRetryable(errorText: string | undefined): boolean {
  if (!errorText) return false;
  return RETRYABLE_MARKERS.some((marker) => errorText.includes(marker));
}
