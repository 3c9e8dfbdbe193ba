import { z } from 'zod';

const PayloadSchema = z.record(z.unknown());

export const RegisteredMessageSchema = z.object({
  type: z.literal('registered'),
  id: z.string().optional(),
  payload: PayloadSchema.optional(),
});

export const ResponseMessageSchema = z.object({
  type: z.literal('response'),
  id: z.string().optional(),
  payload: PayloadSchema.default({}),
});

export const ErrorMessageSchema = z.object({
  type: z.literal('error'),
  id: z.string().optional(),
  error: z.string().optional(),
  payload: PayloadSchema.optional(),
});

/**
 * Messages the device sends back over the socket. Anything else (hello,
 * prompts while pairing) does not match and is ignored by the session.
 */
export const DeviceMessageSchema = z.discriminatedUnion('type', [
  RegisteredMessageSchema,
  ResponseMessageSchema,
  ErrorMessageSchema,
]);
