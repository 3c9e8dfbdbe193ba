import { randomBytes } from 'crypto';

/**
 * Generates a request id for a device command.
 *
 * Format: `prefix_randomhex`, e.g. `get_9f2c01ab`. The TV echoes the id in
 * its response; one command per connection means it only has to be unique
 * within a session, the random part keeps log lines apart.
 * @param prefix - Verb the id starts with
 * @public
 */
export function generateRequestId(prefix: string): string {
  return `${prefix}_${randomBytes(4).toString('hex')}`;
}
