export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Missing file, permission denied or a body that is not a JSON object.
 * Non-fatal: defaults stay in effect.
 */
export class ConfigReadError extends ConfigError {
  public readonly location: string;

  constructor(location: string, reason: string) {
    super(`cannot read config file ${location}: ${reason}`);
    this.name = "ConfigReadError";
    this.location = location;
    Object.setPrototypeOf(this, ConfigReadError.prototype);
  }
}

export class ConfigKeyMissingError extends ConfigError {
  public readonly key: string;

  constructor(key: string) {
    super(`config key "${key}" is missing`);
    this.name = "ConfigKeyMissingError";
    this.key = key;
    Object.setPrototypeOf(this, ConfigKeyMissingError.prototype);
  }
}

export class ConfigKeyInvalidError extends ConfigError {
  public readonly key: string;

  constructor(key: string, reason: string) {
    super(`config key "${key}" ${reason}`);
    this.name = "ConfigKeyInvalidError";
    this.key = key;
    Object.setPrototypeOf(this, ConfigKeyInvalidError.prototype);
  }
}

export class ConfigAlreadyExistsError extends ConfigError {
  public readonly location: string;

  constructor(location: string) {
    super(`config file ${location} already exists`);
    this.name = "ConfigAlreadyExistsError";
    this.location = location;
    Object.setPrototypeOf(this, ConfigAlreadyExistsError.prototype);
  }
}

// Type guards
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isConfigReadError(error: unknown): error is ConfigReadError {
  return error instanceof ConfigReadError;
}

export function isConfigKeyMissingError(error: unknown): error is ConfigKeyMissingError {
  return error instanceof ConfigKeyMissingError;
}

export function isConfigKeyInvalidError(error: unknown): error is ConfigKeyInvalidError {
  return error instanceof ConfigKeyInvalidError;
}

export function isConfigAlreadyExistsError(error: unknown): error is ConfigAlreadyExistsError {
  return error instanceof ConfigAlreadyExistsError;
}
