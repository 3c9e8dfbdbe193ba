import { z } from 'zod';
import bundledManifest from './register-payload.json' with { type: 'json' };

const RegisterPayloadSchema = z.record(z.unknown());

export type RegisterPayload = z.infer<typeof RegisterPayloadSchema>;

export interface RegisterMessage {
  type: 'register';
  payload: RegisterPayload & { 'client-key': string };
}

let cachedPayload: RegisterPayload | undefined;

/**
 * Validates the bundled pairing manifest sent with every register message.
 * @internal
 */
export function loadRegisterPayload(): RegisterPayload {
  if (!cachedPayload) {
    cachedPayload = RegisterPayloadSchema.parse(bundledManifest);
  }
  return cachedPayload;
}

/**
 * Builds the application-level handshake message carrying the pairing key.
 * The manifest is cloned so callers never share nested objects.
 * @param clientKey - Key obtained when the TV was paired
 * @param base - Manifest to embed, defaults to the bundled one
 * @public
 */
export function buildRegisterMessage(
  clientKey: string,
  base: RegisterPayload = loadRegisterPayload(),
): RegisterMessage {
  return {
    type: 'register',
    payload: { ...structuredClone(base), 'client-key': clientKey },
  };
}
