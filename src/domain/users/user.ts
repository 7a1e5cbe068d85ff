import {
  IdAlreadySetError,
  InvalidEmailError,
  InvalidNameError,
  UserAlreadyDeletedError,
  UserNotDeletedError,
} from './errors.js';

export const NAME_MIN_LENGTH = 2;
export const NAME_MAX_LENGTH = 100;

const EMAIL_PATTERN = /^[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}$/;

/**
 * User aggregate state. `id` is undefined until the storage adapter
 * has inserted the row.
 */
export interface UserState {
  readonly id: string | undefined;
  readonly name: string;
  readonly email: string;
  readonly version: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly deletedAt: Date | null;
}

export interface RehydrateUserProps {
  id: string;
  name: string;
  email: string;
  version: number;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

/**
 * A user that has been stored at least once.
 */
export type PersistedUser = User & { readonly id: string };

export function normalizeName(name: string): string {
  return name.trim();
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function validateName(name: string): void {
  // Code points, so an emoji counts once
  const length = [...name].length;
  if (length < NAME_MIN_LENGTH || length > NAME_MAX_LENGTH) {
    throw new InvalidNameError();
  }
}

function copyDate(date: Date): Date {
  return new Date(date.getTime());
}

function copyOptionalDate(date: Date | null): Date | null {
  return date === null ? null : copyDate(date);
}

function validateEmail(email: string): void {
  if (!EMAIL_PATTERN.test(email)) {
    throw new InvalidEmailError();
  }
}

/**
 * User aggregate - enforces naming, email and soft-delete rules on itself.
 * Persistence metadata (id, version) is owned by the storage adapter.
 */
export class User {
  private constructor(private state: UserState) {}

  /**
   * Create a new, unpersisted user. Inputs are normalized before validation.
   */
  static create(name: string, email: string, now: Date): User {
    const normalizedName = normalizeName(name);
    const normalizedEmail = normalizeEmail(email);

    validateName(normalizedName);
    validateEmail(normalizedEmail);

    return new User({
      id: undefined,
      name: normalizedName,
      email: normalizedEmail,
      version: 1,
      createdAt: copyDate(now),
      updatedAt: copyDate(now),
      deletedAt: null,
    });
  }

  /**
   * Rebuild a user from a stored row. No validation: stored data is trusted.
   */
  static rehydrate(props: RehydrateUserProps): PersistedUser {
    const user = new User({
      ...props,
      createdAt: copyDate(props.createdAt),
      updatedAt: copyDate(props.updatedAt),
      deletedAt: copyOptionalDate(props.deletedAt),
    });
    if (!user.isPersisted()) {
      throw new Error('Rehydrated user has no id');
    }
    return user;
  }

  get id(): string | undefined {
    return this.state.id;
  }

  get name(): string {
    return this.state.name;
  }

  get email(): string {
    return this.state.email;
  }

  get version(): number {
    return this.state.version;
  }

  get createdAt(): Date {
    return copyDate(this.state.createdAt);
  }

  get updatedAt(): Date {
    return copyDate(this.state.updatedAt);
  }

  get deletedAt(): Date | null {
    return copyOptionalDate(this.state.deletedAt);
  }

  isDeleted(): boolean {
    return this.state.deletedAt !== null;
  }

  isPersisted(): this is PersistedUser {
    return this.state.id !== undefined;
  }

  /**
   * Detached copy of the current state. Dates are copied too.
   */
  getState(): UserState {
    return {
      ...this.state,
      createdAt: copyDate(this.state.createdAt),
      updatedAt: copyDate(this.state.updatedAt),
      deletedAt: copyOptionalDate(this.state.deletedAt),
    };
  }

  /**
   * Returns false when the normalized name equals the current one.
   */
  changeName(newName: string, now: Date): boolean {
    this.ensureNotDeleted();

    const name = normalizeName(newName);
    validateName(name);

    if (name === this.state.name) {
      return false;
    }

    this.state = { ...this.state, name, updatedAt: copyDate(now) };
    return true;
  }

  /**
   * Returns false when the normalized email equals the current one.
   */
  changeEmail(newEmail: string, now: Date): boolean {
    this.ensureNotDeleted();

    const email = normalizeEmail(newEmail);
    validateEmail(email);

    if (email === this.state.email) {
      return false;
    }

    this.state = { ...this.state, email, updatedAt: copyDate(now) };
    return true;
  }

  delete(now: Date): void {
    this.ensureNotDeleted();
    this.state = { ...this.state, deletedAt: copyDate(now), updatedAt: copyDate(now) };
  }

  restore(now: Date): void {
    if (this.state.deletedAt === null) {
      throw new UserNotDeletedError();
    }
    this.state = { ...this.state, deletedAt: null, updatedAt: copyDate(now) };
  }

  /**
   * One-time identity assignment, called by the storage adapter after insert.
   */
  assignId(id: string): asserts this is PersistedUser {
    if (this.state.id !== undefined) {
      throw new IdAlreadySetError(this.state.id);
    }
    this.state = { ...this.state, id };
  }

  /**
   * Called by the storage adapter after a successful conditional update.
   */
  bumpVersion(): void {
    this.state = { ...this.state, version: this.state.version + 1 };
  }

  private ensureNotDeleted(): void {
    if (this.state.deletedAt !== null) {
      throw new UserAlreadyDeletedError();
    }
  }
}
