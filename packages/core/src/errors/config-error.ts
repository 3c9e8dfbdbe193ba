export type ConfigErrorKind = 'not-found' | 'ambiguous' | 'invalid';

/**
 * The device target could not be loaded. Never retried.
 */
export class ConfigError extends Error {
  public readonly kind: ConfigErrorKind;
  public readonly path?: string;

  public constructor(message: string, kind: ConfigErrorKind, path?: string) {
    super(message);
    this.name = 'ConfigError';
    this.kind = kind;
    this.path = path;

    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      kind: this.kind,
      path: this.path,
    };
  }
}
