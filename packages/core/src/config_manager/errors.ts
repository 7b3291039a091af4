/**
 * Error thrown when .forkflow/config.json cannot be parsed or does not match
 * the configuration schema.
 */
export class ConfigValidationError extends Error {
  public readonly configPath: string;
  public readonly errors: Array<{ field: string; message: string }>;

  constructor(configPath: string, errors: Array<{ field: string; message: string }>) {
    const details = errors.map((error) => `${error.field}: ${error.message}`).join('; ');
    super(`Invalid configuration in ${configPath}: ${details}`);
    this.name = 'ConfigValidationError';
    this.configPath = configPath;
    this.errors = errors;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
