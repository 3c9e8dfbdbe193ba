import { homedir } from 'os';
import { join } from 'path';
import { existsSync, readFileSync } from 'fs';
import { ConfigError } from '@tvlink/core';
import type { ConfigProvider, DeviceTarget } from '@tvlink/models';
import { DeviceConfigSchema, type DeviceConfig } from '@tvlink/schemas';

/**
 * Names tried, in order, when several devices are configured and none is
 * selected explicitly.
 * @public
 */
export const FALLBACK_DEVICE_NAMES = ['MyTV', 'default', 'LG TV'] as const;

/**
 * Returns the device config file path.
 *
 * Resolves to TVLINK_CONFIG if set, otherwise ~/.config/lgtv/config.json,
 * the file the pairing tool writes.
 * @public
 */
export function getConfigPath(): string {
  const override = process.env.TVLINK_CONFIG;
  if (override && override.trim()) return override;
  return join(homedir(), '.config', 'lgtv', 'config.json');
}

/**
 * Picks the device to talk to.
 *
 * 1. An explicit name must exist.
 * 2. A single configured device is used as is.
 * 3. Otherwise the first of {@link FALLBACK_DEVICE_NAMES} present wins.
 * @param config - Parsed config file
 * @param name - Explicit device name, usually from LGTV_NAME
 * @throws {ConfigError} `not-found` or `ambiguous`
 * @public
 */
export function selectDevice(config: DeviceConfig, name?: string): DeviceTarget {
  const names = Object.keys(config);

  if (name) {
    if (!names.includes(name)) {
      throw new ConfigError(`TV '${name}' not found in config`, 'not-found');
    }
    return { address: config[name].ip, key: config[name].key, name };
  }

  if (names.length === 0) {
    throw new ConfigError('No TVs configured', 'not-found');
  }

  if (names.length === 1) {
    const [only] = names;
    return { address: config[only].ip, key: config[only].key, name: only };
  }

  const fallback = FALLBACK_DEVICE_NAMES.find((candidate) => names.includes(candidate));
  if (!fallback) {
    throw new ConfigError(
      `Multiple TVs found, set LGTV_NAME env var: ${names.join(', ')}`,
      'ambiguous',
    );
  }
  return { address: config[fallback].ip, key: config[fallback].key, name: fallback };
}

export interface FileConfigProviderOptions {
  /** Config file path (default: {@link getConfigPath}) */
  path?: string;
  /** Device name (default: LGTV_NAME) */
  deviceName?: string;
}

/**
 * Reads the device target from the JSON config file.
 * @public
 */
export class FileConfigProvider implements ConfigProvider {
  public constructor(private readonly options: FileConfigProviderOptions = {}) {}

  public async load(): Promise<DeviceTarget> {
    const path = this.options.path ?? getConfigPath();
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${path}`, 'not-found', path);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        `Cannot parse ${path}: ${error instanceof Error ? error.message : String(error)}`,
        'invalid',
        path,
      );
    }

    const parsed = DeviceConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(
        `Invalid config ${path}: ${issue.path.join('.')}: ${issue.message}`,
        'invalid',
        path,
      );
    }

    return selectDevice(parsed.data, this.options.deviceName ?? process.env.LGTV_NAME);
  }
}
