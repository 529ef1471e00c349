/**
 * Error types
 */

/**
 * A value does not satisfy the dtype of the field it is assigned to
 */
export class FieldTypeError extends TypeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FieldTypeError';
  }
}

/**
 * A field was read while none of its value, instance default or field default is set
 */
export class MandatoryFieldError extends TypeError {
  constructor(readonly fieldName: string) {
    super(`Field "${fieldName}" is mandatory, yet it has been accessed without being set.`);
    this.name = 'MandatoryFieldError';
  }
}

/**
 * Signals a cache miss: the storage has nothing to read for the request
 */
export class NoDataSourceError extends Error {
  constructor(message = 'No data source available.') {
    super(message);
    this.name = 'NoDataSourceError';
  }
}

/**
 * Signals that the storage cannot be written to
 */
export class NoDataTargetError extends Error {
  constructor(message = 'No data target available.') {
    super(message);
    this.name = 'NoDataTargetError';
  }
}

export class CheckpointError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CheckpointError';
  }
}

export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
