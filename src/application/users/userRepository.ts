import type { PersistedUser, User } from '../../domain/users/user.js';

export const MAX_LIST_LIMIT = 1000;

/**
 * Query constraints for listing and counting users, combined with AND.
 * Soft-deleted users are excluded unless `includeDeleted` is true.
 */
export interface UserFilter {
  includeDeleted?: boolean;
  /** Exact match after normalization. */
  email?: string;
  /** Exclusive lower bound on createdAt. */
  createdAfter?: Date;
  /** Exclusive upper bound on createdAt. */
  createdBefore?: Date;
}

/**
 * Keyset cursor: the id of the last row seen. Listing is ordered by id ascending.
 */
export interface Cursor {
  afterId: string;
}

export interface UserPage {
  users: PersistedUser[];
  nextCursor?: Cursor;
}

/**
 * Storage adapter contract for the User aggregate.
 *
 * Write operations own identity and versioning: `create` assigns the id,
 * `update` matches on (id, version) and bumps the in-memory version.
 */
export interface UserRepository {
  /**
   * Throws DuplicateEmailError if another active user has the same email.
   */
  create(user: User, signal?: AbortSignal): Promise<PersistedUser>;

  /**
   * Throws VersionConflictError when no row matches (id, version),
   * DuplicateEmailError on email uniqueness violation.
   */
  update(user: PersistedUser, signal?: AbortSignal): Promise<void>;

  /**
   * Returns the user even if soft-deleted. Throws NotFoundError.
   */
  getById(id: string, signal?: AbortSignal): Promise<PersistedUser>;

  /**
   * Active users only. Throws NotFoundError.
   */
  getByEmail(email: string, signal?: AbortSignal): Promise<PersistedUser>;

  /**
   * A next cursor is returned only when the page is full, so a store whose
   * size is a multiple of `limit` yields one extra empty page.
   */
  list(
    filter: UserFilter,
    cursor: Cursor | undefined,
    limit: number,
    signal?: AbortSignal
  ): Promise<UserPage>;

  count(filter: UserFilter, signal?: AbortSignal): Promise<number>;

  ping(signal?: AbortSignal): Promise<void>;
}
