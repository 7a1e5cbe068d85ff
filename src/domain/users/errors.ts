export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidNameError extends DomainError {
  constructor(message = 'Name must be between 2 and 100 characters') {
    super(message);
  }
}

export class InvalidEmailError extends DomainError {
  constructor(message = 'Invalid email address') {
    super(message);
  }
}

export class UserAlreadyDeletedError extends DomainError {
  constructor(message = 'User already deleted') {
    super(message);
  }
}

export class UserNotDeletedError extends DomainError {
  constructor(message = 'User is not deleted') {
    super(message);
  }
}

/**
 * Raised when identity is assigned twice. This is a defect in the caller
 * (only the storage adapter assigns ids), so it is not a DomainError.
 */
export class IdAlreadySetError extends Error {
  constructor(public readonly existingId: string) {
    super(`User id already set to ${existingId}`);
    this.name = 'IdAlreadySetError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
