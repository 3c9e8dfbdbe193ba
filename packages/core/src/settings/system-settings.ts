import type {
  CommandResult,
  CommandSession,
  DeviceCommand,
  ResponsePayload,
} from '@tvlink/models';
import { generateRequestId } from '../utils/request/generateRequestId.js';

export const GET_SYSTEM_SETTINGS_URI = 'ssap://settings/getSystemSettings';
export const SET_SYSTEM_SETTINGS_URI = 'ssap://settings/setSystemSettings';

export type SettingValue = string | number | boolean;

/**
 * Builds a request command with a fresh id.
 * @param prefix - Id prefix, e.g. `get`
 * @param uri - ssap:// endpoint
 * @param payload - Endpoint parameters
 * @public
 */
export function buildRequest(
  prefix: string,
  uri: string,
  payload: Record<string, unknown> = {},
): DeviceCommand {
  const command: DeviceCommand = {
    type: 'request',
    id: generateRequestId(prefix),
    uri,
    payload: Object.freeze({ ...payload }),
  };
  return Object.freeze(command);
}

function isRecord(value: unknown): value is ResponsePayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads one system setting, e.g. `picture` / `backlight`.
 *
 * Succeeds with the value found under `settings[key]` in the response.
 * @public
 */
export async function getSystemSetting(
  session: CommandSession,
  category: string,
  key: string,
): Promise<CommandResult<unknown>> {
  const result = await session.execute(
    buildRequest('get', GET_SYSTEM_SETTINGS_URI, { category, keys: [key] }),
  );
  if (!result.ok) return result;

  const settings = result.payload.settings;
  if (!isRecord(settings) || !(key in settings)) {
    return { ok: false, error: `Setting "${key}" not present in response` };
  }
  return { ok: true, payload: settings[key] };
}

/**
 * Writes one or more settings of a category.
 * @public
 */
export async function setSystemSetting(
  session: CommandSession,
  category: string,
  settings: Record<string, SettingValue>,
): Promise<CommandResult<true>> {
  const result = await session.execute(
    buildRequest('set', SET_SYSTEM_SETTINGS_URI, { category, settings }),
  );
  return result.ok ? { ok: true, payload: true } : result;
}
