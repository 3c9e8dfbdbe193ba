import type { SettingValue } from '@tvlink/core';

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Coerces a CLI value: `true`/`false` become booleans, plain decimals
 * become numbers, everything else stays a string.
 * @example
 * ```typescript
 * coerceSettingValue('70');   // 70
 * coerceSettingValue('true'); // true
 * coerceSettingValue('off');  // 'off'
 * ```
 * @public
 */
export function coerceSettingValue(raw: string): SettingValue {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (NUMBER_PATTERN.test(raw)) return Number(raw);
  return raw;
}

/**
 * Parses `key=value` pairs into a settings object. Later pairs win.
 * @param pairs - Arguments such as `['backlight=70', 'energySaving=off']`
 * @throws {Error} When a pair has no `=` or an empty key
 * @public
 */
export function parseSettingAssignments(pairs: string[]): Record<string, SettingValue> {
  const settings: Record<string, SettingValue> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Expected key=value, got "${pair}"`);
    }
    settings[pair.slice(0, separator)] = coerceSettingValue(pair.slice(separator + 1));
  }
  return settings;
}
