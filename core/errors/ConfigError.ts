import { QuireError, ErrorSeverity } from './QuireError';

/**
 * Thrown when a configuration file holds a value of the right shape but an
 * unusable content, such as a negative depth limit.
 */
export class ConfigError extends QuireError {
  public readonly key: string;

  constructor(key: string, value: unknown, expected: string, filePath?: string) {
    super(
      `Invalid value for ${key}: ${JSON.stringify(value)} (expected ${expected})` +
        (filePath ? ` in ${filePath}` : ''),
      {
        code: 'INVALID_CONFIG',
        severity: ErrorSeverity.Fatal,
        details: { key, value, expected, filePath }
      }
    );
    this.key = key;
  }
}
