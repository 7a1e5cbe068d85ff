import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { QueryResult, QueryResultRow } from 'pg';
import { PostgresUserRepo } from '../postgresUserRepo.js';
import type { QueryRunner } from '../pool.js';
import { User } from '../../../domain/users/user.js';
import { IdAlreadySetError } from '../../../domain/users/errors.js';
import {
  CancelledError,
  DuplicateEmailError,
  InvalidInputError,
  NotFoundError,
  StorageError,
  VersionConflictError,
} from '../../../application/errors.js';

const UUID_V7 = /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const ID_1 = '018f3a6e-7c2d-7000-8000-000000000001';
const ID_2 = '018f3a6e-7c2d-7000-8000-000000000002';

function result<R extends QueryResultRow>(rows: R[], rowCount = rows.length): QueryResult<R> {
  return { rows, rowCount, command: '', oid: 0, fields: [] };
}

function row(id: string, overrides: Partial<Record<string, unknown>> = {}) {
  return {
    id,
    name: 'Ada',
    email: 'ada@example.com',
    version: 1,
    created_at: new Date('2024-01-01T00:00:00.000Z'),
    updated_at: new Date('2024-01-01T00:00:00.000Z'),
    deleted_at: null,
    ...overrides,
  };
}

/**
 * Collapse whitespace so assertions read like single-line SQL.
 */
function sqlOf(call: unknown[]): string {
  return String(call[0]).replace(/\s+/g, ' ').trim();
}

describe('PostgresUserRepo', () => {
  let query: ReturnType<typeof vi.fn>;
  let repo: PostgresUserRepo;

  beforeEach(() => {
    query = vi.fn();
    const db: QueryRunner = { query };
    repo = new PostgresUserRepo(db);
  });

  describe('create', () => {
    it('should insert at version 1 and assign a UUIDv7 after the insert', async () => {
      const now = new Date('2024-01-01T00:00:00.000Z');
      const user = User.create('Ada', 'ada@example.com', now);
      query.mockResolvedValueOnce(result([], 1));

      const persisted = await repo.create(user);

      expect(persisted).toBe(user);
      expect(persisted.id).toMatch(UUID_V7);
      expect(persisted.version).toBe(1);

      const [sql, params] = query.mock.calls[0];
      expect(sqlOf([sql])).toBe(
        'INSERT INTO users (id, name, email, version, created_at, updated_at, deleted_at) VALUES ($1, $2, $3, 1, $4, $5, $6)'
      );
      expect(params).toEqual([persisted.id, 'Ada', 'ada@example.com', now, now, null]);
    });

    it('should map unique violations to DuplicateEmailError and leave the id unset', async () => {
      const user = User.create('Ada', 'ada@example.com', new Date());
      query.mockRejectedValueOnce(Object.assign(new Error('duplicate key'), { code: '23505' }));

      await expect(repo.create(user)).rejects.toBeInstanceOf(DuplicateEmailError);
      expect(user.id).toBeUndefined();
    });

    it('should wrap other driver errors in StorageError', async () => {
      const user = User.create('Ada', 'ada@example.com', new Date());
      const driverError = new Error('connection terminated');
      query.mockRejectedValueOnce(driverError);

      const error = await repo.create(user).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toHaveProperty('message', 'Failed to create user');
      expect(error).toHaveProperty('cause', driverError);
      expect(user.id).toBeUndefined();
    });

    it('should refuse an already persisted user without querying', async () => {
      const user = User.rehydrate({
        id: ID_1,
        name: 'Ada',
        email: 'ada@example.com',
        version: 1,
        createdAt: new Date(),
        updatedAt: new Date(),
        deletedAt: null,
      });

      await expect(repo.create(user)).rejects.toBeInstanceOf(IdAlreadySetError);
      expect(query).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    const loaded = () =>
      User.rehydrate({
        id: ID_1,
        name: 'Ada',
        email: 'ada@example.com',
        version: 3,
        createdAt: new Date('2024-01-01T00:00:00.000Z'),
        updatedAt: new Date('2024-01-01T00:00:00.000Z'),
        deletedAt: null,
      });

    it('should match on id and version and bump the in-memory version', async () => {
      const user = loaded();
      const later = new Date('2024-01-02T00:00:00.000Z');
      user.changeName('Grace', later);
      query.mockResolvedValueOnce(result([], 1));

      await repo.update(user);

      const [sql, params] = query.mock.calls[0];
      expect(sqlOf([sql])).toBe(
        'UPDATE users SET name = $1, email = $2, version = version + 1, updated_at = $3, deleted_at = $4 WHERE id = $5 AND version = $6'
      );
      expect(params).toEqual(['Grace', 'ada@example.com', later, null, ID_1, 3]);
      expect(user.version).toBe(4);
    });

    it('should report VersionConflictError when no row matched', async () => {
      const user = loaded();
      query.mockResolvedValueOnce(result([], 0));

      const error = await repo.update(user).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VersionConflictError);
      expect(error).toMatchObject({ id: ID_1, expectedVersion: 3 });
      expect(user.version).toBe(3);
    });

    it('should map unique violations to DuplicateEmailError', async () => {
      const user = loaded();
      query.mockRejectedValueOnce({ code: '23505' });

      await expect(repo.update(user)).rejects.toBeInstanceOf(DuplicateEmailError);
      expect(user.version).toBe(3);
    });
  });

  describe('getById', () => {
    it('should return soft-deleted rows', async () => {
      const deletedAt = new Date('2024-02-01T00:00:00.000Z');
      query.mockResolvedValueOnce(result([row(ID_1, { deleted_at: deletedAt, version: 2 })]));

      const user = await repo.getById(ID_1);

      expect(user.id).toBe(ID_1);
      expect(user.version).toBe(2);
      expect(user.deletedAt).toEqual(deletedAt);
      expect(sqlOf(query.mock.calls[0])).toBe(
        'SELECT id, name, email, version, created_at, updated_at, deleted_at FROM users WHERE id = $1'
      );
    });

    it('should throw NotFoundError when no row exists', async () => {
      query.mockResolvedValueOnce(result([]));
      await expect(repo.getById(ID_1)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should treat a malformed id as not found without querying', async () => {
      await expect(repo.getById('not-a-uuid')).rejects.toBeInstanceOf(NotFoundError);
      expect(query).not.toHaveBeenCalled();
    });
  });

  describe('getByEmail', () => {
    it('should normalize the email and only match active rows', async () => {
      query.mockResolvedValueOnce(result([row(ID_1)]));

      const user = await repo.getByEmail('  ADA@Example.com ');

      expect(user.email).toBe('ada@example.com');
      const [sql, params] = query.mock.calls[0];
      expect(sqlOf([sql])).toBe(
        'SELECT id, name, email, version, created_at, updated_at, deleted_at FROM users WHERE email = $1 AND deleted_at IS NULL'
      );
      expect(params).toEqual(['ada@example.com']);
    });

    it('should throw NotFoundError when no active row matches', async () => {
      query.mockResolvedValueOnce(result([]));
      await expect(repo.getByEmail('ada@example.com')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('list', () => {
    it('should exclude deleted rows and order by id by default', async () => {
      query.mockResolvedValueOnce(result([row(ID_1)]));

      const page = await repo.list({}, undefined, 2);

      const [sql, params] = query.mock.calls[0];
      expect(sqlOf([sql])).toBe(
        'SELECT id, name, email, version, created_at, updated_at, deleted_at FROM users WHERE deleted_at IS NULL ORDER BY id ASC LIMIT $1'
      );
      expect(params).toEqual([2]);
      expect(page.users.map((u) => u.id)).toEqual([ID_1]);
      expect(page.nextCursor).toBeUndefined();
    });

    it('should AND every filter with the cursor predicate in parameter order', async () => {
      const after = new Date('2024-01-01T00:00:00.000Z');
      const before = new Date('2024-02-01T00:00:00.000Z');
      query.mockResolvedValueOnce(result([]));

      await repo.list(
        { includeDeleted: true, email: 'Ada@Example.com', createdAfter: after, createdBefore: before },
        { afterId: ID_1 },
        10
      );

      const [sql, params] = query.mock.calls[0];
      expect(sqlOf([sql])).toBe(
        'SELECT id, name, email, version, created_at, updated_at, deleted_at FROM users WHERE email = $1 AND created_at > $2 AND created_at < $3 AND id > $4 ORDER BY id ASC LIMIT $5'
      );
      expect(params).toEqual(['ada@example.com', after, before, ID_1, 10]);
    });

    it('should emit a cursor with the last id only when the page is full', async () => {
      query.mockResolvedValueOnce(result([row(ID_1), row(ID_2)]));

      const page = await repo.list({}, undefined, 2);

      expect(page.nextCursor).toEqual({ afterId: ID_2 });
    });

    it('should clamp the limit to 1000', async () => {
      query.mockResolvedValueOnce(result([]));

      await repo.list({}, undefined, 5000);

      expect(query.mock.calls[0][1]).toEqual([1000]);
    });

    it('should reject a non-positive limit without querying', async () => {
      await expect(repo.list({}, undefined, 0)).rejects.toBeInstanceOf(InvalidInputError);
      expect(query).not.toHaveBeenCalled();
    });

    it('should reject a cursor that is not a UUID', async () => {
      await expect(repo.list({}, { afterId: 'abc' }, 10)).rejects.toBeInstanceOf(
        InvalidInputError
      );
    });
  });

  describe('count', () => {
    it('should apply the same filter and parse the bigint count', async () => {
      query.mockResolvedValueOnce(result([{ count: '42' }]));

      const total = await repo.count({ email: 'ada@example.com' });

      expect(total).toBe(42);
      const [sql, params] = query.mock.calls[0];
      expect(sqlOf([sql])).toBe(
        'SELECT COUNT(*) AS count FROM users WHERE deleted_at IS NULL AND email = $1'
      );
      expect(params).toEqual(['ada@example.com']);
    });

    it('should omit WHERE when nothing is filtered', async () => {
      query.mockResolvedValueOnce(result([{ count: '3' }]));

      await repo.count({ includeDeleted: true });

      expect(sqlOf(query.mock.calls[0])).toBe('SELECT COUNT(*) AS count FROM users');
    });
  });

  describe('ping', () => {
    it('should run SELECT 1', async () => {
      query.mockResolvedValueOnce(result([{ '?column?': 1 }]));

      await repo.ping();

      expect(sqlOf(query.mock.calls[0])).toBe('SELECT 1');
    });

    it('should wrap failures in StorageError', async () => {
      query.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      await expect(repo.ping()).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('cancellation', () => {
    it('should not query when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(repo.getById(ID_1, controller.signal)).rejects.toBeInstanceOf(CancelledError);
      expect(query).not.toHaveBeenCalled();
    });

    it('should stop waiting when the signal aborts mid-query', async () => {
      const controller = new AbortController();
      query.mockReturnValueOnce(new Promise(() => {}));

      const pending = repo.ping(controller.signal);
      controller.abort(new Error('timeout'));

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });
  });
});
