export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly code = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'CatalogError';
  }
}

export class NotFoundError extends CatalogError {
  constructor(message = 'Resource not found', details?: unknown, options?: ErrorOptions) {
    super(message, 'NOT_FOUND', details, options);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends CatalogError {
  constructor(message = 'Resource already exists', details?: unknown, options?: ErrorOptions) {
    super(message, 'CONFLICT', details, options);
    this.name = 'ConflictError';
  }
}

export class ConfigurationError extends CatalogError {
  constructor(message = 'Invalid configuration', details?: unknown, options?: ErrorOptions) {
    super(message, 'CONFIGURATION_ERROR', details, options);
    this.name = 'ConfigurationError';
  }
}

export class TransportError extends CatalogError {
  constructor(message = 'Transport failed', details?: unknown, options?: ErrorOptions) {
    super(message, 'TRANSPORT_ERROR', details, options);
    this.name = 'TransportError';
  }
}

export class IOError extends CatalogError {
  constructor(message = 'I/O failed', details?: unknown, options?: ErrorOptions) {
    super(message, 'IO_ERROR', details, options);
    this.name = 'IOError';
  }
}

export class SchemaError extends CatalogError {
  constructor(message = 'Manifest does not match a valid schema', details?: unknown, options?: ErrorOptions) {
    super(message, 'SCHEMA_ERROR', details, options);
    this.name = 'SchemaError';
  }
}

export class StoreError extends CatalogError {
  constructor(message = 'Catalog store operation failed', details?: unknown, options?: ErrorOptions) {
    super(message, 'STORE_ERROR', details, options);
    this.name = 'StoreError';
  }
}

export class UnsupportedQueryError extends CatalogError {
  constructor(message = 'Unsupported lookup query', details?: unknown, options?: ErrorOptions) {
    super(message, 'UNSUPPORTED_QUERY', details, options);
    this.name = 'UnsupportedQueryError';
  }
}

export class LookupError extends CatalogError {
  constructor(message = 'Lookup failed', details?: unknown, options?: ErrorOptions) {
    super(message, 'LOOKUP_ERROR', details, options);
    this.name = 'LookupError';
  }
}
