import { z } from 'zod';
import { buildRequest } from '@tvlink/core';
import type { CommandResult, ResponsePayload } from '@tvlink/models';
import { runDeviceOperation, type CommandContext } from './context.js';

const RequestPayloadSchema = z.record(z.unknown());

/**
 * Parses the optional JSON payload argument of `tvlink request`.
 * @throws {Error} When the text is not a JSON object
 */
export function parseRequestPayload(text: string | undefined): Record<string, unknown> {
  if (text === undefined) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(
      `Payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = RequestPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error('Payload must be a JSON object');
  }
  return parsed.data;
}

/**
 * `tvlink request <uri> [payload]`: sends a raw ssap:// request.
 */
export function sendRequest(
  context: CommandContext,
  uri: string,
  payload: Record<string, unknown>,
): Promise<CommandResult<ResponsePayload>> {
  return runDeviceOperation(
    context,
    (session) => session.execute(buildRequest('request', uri, payload)),
    `Request ${uri} failed`,
  );
}
