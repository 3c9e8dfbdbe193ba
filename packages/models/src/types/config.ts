/**
 * Address and pairing key of the device to talk to.
 */
export interface DeviceTarget {
  address: string;
  key: string;
  /** Name of the entry the target was selected from, when known */
  name?: string;
}

/**
 * Source of the device target. Implementations reject with a config error
 * when the target cannot be found or cannot be chosen unambiguously.
 */
export interface ConfigProvider {
  load(): Promise<DeviceTarget>;
}
