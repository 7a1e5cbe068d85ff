/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidInputError extends Error {
  constructor(message = 'Invalid input', options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidInputError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateEmailError extends ConflictError {
  constructor(message = 'Email already in use') {
    super(message);
    this.name = 'DuplicateEmailError';
  }
}

/**
 * Optimistic lock mismatch: the row is gone or its version moved on.
 * Callers re-read to tell the two apart.
 */
export class VersionConflictError extends ConflictError {
  constructor(
    public readonly id: string,
    public readonly expectedVersion: number
  ) {
    super(`Version conflict: user ${id} is no longer at version ${expectedVersion}`);
    this.name = 'VersionConflictError';
  }
}

/**
 * Opaque storage failure (connectivity, malformed rows). The driver error is kept as `cause`.
 */
export class StorageError extends Error {
  constructor(message = 'Storage failure', options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled', options?: ErrorOptions) {
    super(message, options);
    this.name = 'CancelledError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
