/** Base of every error this package throws; `code` is stable for callers to branch on. */
export class CompanionError extends Error {
  override name = 'CompanionError';

  constructor(
    message: string,
    readonly code: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** Raised while building a pattern table; the classifier is never constructed. */
export class PatternTableError extends CompanionError {
  public readonly category: string | undefined;

  constructor(message: string, category?: string, options?: ErrorOptions) {
    super(message, 'PATTERN_TABLE', options);
    this.name = 'PatternTableError';
    this.category = category;
  }
}

export class ConfigError extends CompanionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export class StorageError extends CompanionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORAGE', options);
    this.name = 'StorageError';
  }
}
