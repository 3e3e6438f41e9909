/**
 * Error thrown when the configuration file cannot be used
 */
export class ConfigError extends Error {
  constructor(path: string, message: string) {
    super(`Invalid config at ${path}: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * Error thrown when the cache backend cannot be opened or initialized
 */
export class StorageOpenError extends Error {
  constructor(backend: string, location: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to open ${backend} cache at ${location}: ${detail}`);
    this.name = 'StorageOpenError';
  }
}

/**
 * Error thrown when the pricing table cannot be read or parsed
 */
export class PricingLoadError extends Error {
  constructor(path: string, message: string) {
    super(`Failed to load pricing from ${path}: ${message}`);
    this.name = 'PricingLoadError';
  }
}
