import { z } from 'zod';

/**
 * One paired device in the config file. Extra fields written by the pairing
 * tool (mac address, model, ...) are kept.
 */
export const DeviceEntrySchema = z
  .object({
    ip: z.string().min(1, 'ip is required'),
    key: z.string().min(1, 'key is required'),
  })
  .passthrough();

/**
 * Whole config file: device name to device entry.
 */
export const DeviceConfigSchema = z.record(DeviceEntrySchema);
