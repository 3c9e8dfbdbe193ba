import { getSystemSetting, setSystemSetting, type SettingValue } from '@tvlink/core';
import type { CommandResult } from '@tvlink/models';
import { runDeviceOperation, type CommandContext } from './context.js';

/**
 * `tvlink get <category> <key>`
 */
export function getSetting(
  context: CommandContext,
  category: string,
  key: string,
): Promise<CommandResult<unknown>> {
  return runDeviceOperation(
    context,
    (session) => getSystemSetting(session, category, key),
    `Failed to read ${category}.${key}`,
  );
}

/**
 * `tvlink set <category> <key=value...>`
 */
export function setSettings(
  context: CommandContext,
  category: string,
  settings: Record<string, SettingValue>,
): Promise<CommandResult<true>> {
  return runDeviceOperation(
    context,
    (session) => setSystemSetting(session, category, settings),
    `Failed to update ${category}`,
  );
}
