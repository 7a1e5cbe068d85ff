import { DomainError } from '../../domain/users/errors.js';
import { PersistedUser, User } from '../../domain/users/user.js';
import { ensureNotCancelled } from '../cancellation.js';
import { InvalidInputError, NotFoundError } from '../errors.js';
import { Cursor, UserFilter, UserPage, UserRepository } from './userRepository.js';

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function toInvalidInput(action: string, error: unknown): unknown {
  if (error instanceof DomainError) {
    return new InvalidInputError(`${action}: ${error.message}`, { cause: error });
  }
  return error;
}

/**
 * Orchestrates the User aggregate and its storage adapter.
 * Every operation fails fast with CancelledError when `signal` is already aborted.
 */
export class UserService {
  constructor(
    private readonly users: UserRepository,
    private readonly clock: Clock = systemClock
  ) {}

  async createUser(name: string, email: string, signal?: AbortSignal): Promise<PersistedUser> {
    ensureNotCancelled(signal);

    let user: User;
    try {
      user = User.create(name, email, this.clock());
    } catch (error) {
      throw toInvalidInput('create user', error);
    }

    return this.users.create(user, signal);
  }

  /**
   * Applies name then email with the same timestamp. When neither value
   * changes nothing is written and the stored user is returned as-is.
   */
  async updateUser(
    id: string,
    name: string,
    email: string,
    signal?: AbortSignal
  ): Promise<PersistedUser> {
    ensureNotCancelled(signal);

    const user = await this.getVisible(id, signal);
    const now = this.clock();

    let changed: boolean;
    try {
      const nameChanged = user.changeName(name, now);
      const emailChanged = user.changeEmail(email, now);
      changed = nameChanged || emailChanged;
    } catch (error) {
      throw toInvalidInput('update user', error);
    }

    if (!changed) {
      return user;
    }

    await this.users.update(user, signal);
    return user;
  }

  /**
   * Soft delete. Deleting an already-deleted user reports NotFoundError.
   */
  async deleteUser(id: string, signal?: AbortSignal): Promise<void> {
    ensureNotCancelled(signal);

    const user = await this.getVisible(id, signal);
    user.delete(this.clock());

    await this.users.update(user, signal);
  }

  async getUser(id: string, signal?: AbortSignal): Promise<PersistedUser> {
    ensureNotCancelled(signal);
    return this.getVisible(id, signal);
  }

  async getByEmail(email: string, signal?: AbortSignal): Promise<PersistedUser> {
    ensureNotCancelled(signal);
    return this.users.getByEmail(email, signal);
  }

  async listUsers(
    filter: UserFilter,
    cursor: Cursor | undefined,
    limit: number,
    signal?: AbortSignal
  ): Promise<UserPage> {
    ensureNotCancelled(signal);
    return this.users.list(filter, cursor, limit, signal);
  }

  async countUsers(filter: UserFilter, signal?: AbortSignal): Promise<number> {
    ensureNotCancelled(signal);
    return this.users.count(filter, signal);
  }

  async ping(signal?: AbortSignal): Promise<void> {
    ensureNotCancelled(signal);
    await this.users.ping(signal);
  }

  private async getVisible(id: string, signal?: AbortSignal): Promise<PersistedUser> {
    const user = await this.users.getById(id, signal);
    if (user.isDeleted()) {
      throw new NotFoundError(`User ${id} not found`);
    }
    return user;
  }
}
