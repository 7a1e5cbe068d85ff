import { v7 as uuidv7, validate as isUuid } from 'uuid';
import { IdAlreadySetError } from '../../domain/users/errors.js';
import { normalizeEmail, PersistedUser, User } from '../../domain/users/user.js';
import { ensureNotCancelled, withSignal } from '../../application/cancellation.js';
import {
  CancelledError,
  DuplicateEmailError,
  InvalidInputError,
  NotFoundError,
  StorageError,
  VersionConflictError,
} from '../../application/errors.js';
import { normalizeLimit } from '../../application/users/pagination.js';
import type {
  Cursor,
  UserFilter,
  UserPage,
  UserRepository,
} from '../../application/users/userRepository.js';
import type { QueryRunner } from './pool.js';

interface UserRow {
  id: string;
  name: string;
  email: string;
  version: number;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
}

const USER_COLUMNS = 'id, name, email, version, created_at, updated_at, deleted_at';

// Postgres unique_violation
const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

function toUser(row: UserRow): PersistedUser {
  return User.rehydrate({
    id: row.id,
    name: row.name,
    email: row.email,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  });
}

/**
 * Pushes filter values onto `params` and returns the matching predicates.
 */
function buildConditions(filter: UserFilter, params: unknown[]): string[] {
  const conditions: string[] = [];

  if (!filter.includeDeleted) {
    conditions.push('deleted_at IS NULL');
  }
  if (filter.email !== undefined) {
    params.push(normalizeEmail(filter.email));
    conditions.push(`email = $${params.length}`);
  }
  if (filter.createdAfter !== undefined) {
    params.push(filter.createdAfter);
    conditions.push(`created_at > $${params.length}`);
  }
  if (filter.createdBefore !== undefined) {
    params.push(filter.createdBefore);
    conditions.push(`created_at < $${params.length}`);
  }

  return conditions;
}

function whereClause(conditions: string[]): string {
  return conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
}

export class PostgresUserRepo implements UserRepository {
  constructor(private readonly db: QueryRunner) {}

  async create(user: User, signal?: AbortSignal): Promise<PersistedUser> {
    if (user.isPersisted()) {
      throw new IdAlreadySetError(user.id);
    }

    // UUIDv7 ids sort by creation time, which keyset pagination relies on
    const id = uuidv7();

    await this.run('create user', signal, () =>
      this.db.query(
        `INSERT INTO users (${USER_COLUMNS})
         VALUES ($1, $2, $3, 1, $4, $5, $6)`,
        [id, user.name, user.email, user.createdAt, user.updatedAt, user.deletedAt]
      )
    );

    // Only after the insert succeeded
    user.assignId(id);
    return user;
  }

  async update(user: PersistedUser, signal?: AbortSignal): Promise<void> {
    const result = await this.run('update user', signal, () =>
      this.db.query(
        `UPDATE users
         SET name = $1, email = $2, version = version + 1,
             updated_at = $3, deleted_at = $4
         WHERE id = $5 AND version = $6`,
        [user.name, user.email, user.updatedAt, user.deletedAt, user.id, user.version]
      )
    );

    if (result.rowCount !== 1) {
      throw new VersionConflictError(user.id, user.version);
    }

    user.bumpVersion();
  }

  async getById(id: string, signal?: AbortSignal): Promise<PersistedUser> {
    if (!isUuid(id)) {
      throw new NotFoundError(`User ${id} not found`);
    }

    const result = await this.run('get user by id', signal, () =>
      this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id])
    );

    if (result.rows.length === 0) {
      throw new NotFoundError(`User ${id} not found`);
    }
    return toUser(result.rows[0]);
  }

  async getByEmail(email: string, signal?: AbortSignal): Promise<PersistedUser> {
    const normalized = normalizeEmail(email);

    const result = await this.run('get user by email', signal, () =>
      this.db.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users
         WHERE email = $1 AND deleted_at IS NULL`,
        [normalized]
      )
    );

    if (result.rows.length === 0) {
      throw new NotFoundError(`User with email ${normalized} not found`);
    }
    return toUser(result.rows[0]);
  }

  async list(
    filter: UserFilter,
    cursor: Cursor | undefined,
    limit: number,
    signal?: AbortSignal
  ): Promise<UserPage> {
    const pageSize = normalizeLimit(limit);
    const params: unknown[] = [];
    const conditions = buildConditions(filter, params);

    if (cursor) {
      if (!isUuid(cursor.afterId)) {
        throw new InvalidInputError('Invalid cursor');
      }
      params.push(cursor.afterId);
      conditions.push(`id > $${params.length}`);
    }

    params.push(pageSize);
    const query =
      `SELECT ${USER_COLUMNS} FROM users` +
      whereClause(conditions) +
      ` ORDER BY id ASC LIMIT $${params.length}`;

    const result = await this.run('list users', signal, () =>
      this.db.query<UserRow>(query, params)
    );

    const users = result.rows.map(toUser);
    const last = users[users.length - 1];

    // Full page: assume more may follow. No lookahead query.
    if (users.length === pageSize && last) {
      return { users, nextCursor: { afterId: last.id } };
    }
    return { users };
  }

  async count(filter: UserFilter, signal?: AbortSignal): Promise<number> {
    const params: unknown[] = [];
    const conditions = buildConditions(filter, params);

    const result = await this.run('count users', signal, () =>
      this.db.query<{ count: string }>(
        'SELECT COUNT(*) AS count FROM users' + whereClause(conditions),
        params
      )
    );

    return Number(result.rows[0]?.count ?? 0);
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await this.run('ping database', signal, () => this.db.query('SELECT 1'));
  }

  /**
   * Runs one statement, translating driver failures into the storage error taxonomy.
   */
  private async run<T>(
    action: string,
    signal: AbortSignal | undefined,
    statement: () => Promise<T>
  ): Promise<T> {
    ensureNotCancelled(signal);

    try {
      return await withSignal(statement(), signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError();
      }
      throw new StorageError(`Failed to ${action}`, { cause: error });
    }
  }
}
