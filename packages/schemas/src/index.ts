import { z } from 'zod';
import { DeviceConfigSchema, DeviceEntrySchema } from './config/DeviceConfigSchema.js';
import { RetryOptionsSchema } from './config/RetryOptionsSchema.js';
import {
  DeviceMessageSchema,
  ErrorMessageSchema,
  RegisteredMessageSchema,
  ResponseMessageSchema,
} from './protocol/DeviceMessageSchema.js';

export { DeviceConfigSchema, DeviceEntrySchema } from './config/DeviceConfigSchema.js';
export { MAX_TIMER_DELAY_MS, RetryOptionsSchema } from './config/RetryOptionsSchema.js';
export {
  DeviceMessageSchema,
  RegisteredMessageSchema,
  ResponseMessageSchema,
  ErrorMessageSchema,
} from './protocol/DeviceMessageSchema.js';

export type DeviceEntry = z.infer<typeof DeviceEntrySchema>;
export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;
export type RetryOptions = z.infer<typeof RetryOptionsSchema>;
export type DeviceMessage = z.infer<typeof DeviceMessageSchema>;
export type RegisteredMessage = z.infer<typeof RegisteredMessageSchema>;
export type ResponseMessage = z.infer<typeof ResponseMessageSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
