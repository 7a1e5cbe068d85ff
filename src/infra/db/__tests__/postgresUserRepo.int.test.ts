import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { buildConfig } from '../../../config.js';
import { createLogger } from '../../logger.js';
import { createPool, DbPool, toQueryRunner } from '../pool.js';
import { runMigrations } from '../migrations.js';
import { PostgresUserRepo } from '../postgresUserRepo.js';
import { User } from '../../../domain/users/user.js';
import {
  DuplicateEmailError,
  NotFoundError,
  VersionConflictError,
} from '../../../application/errors.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('PostgresUserRepo (database)', () => {
  const now = new Date('2024-03-01T09:30:00.000Z');
  let pool: DbPool;
  let repo: PostgresUserRepo;

  beforeAll(async () => {
    const config = buildConfig();
    const logger = createLogger({ ...config, nodeEnv: 'test' });
    pool = createPool(config.db, logger);
    await runMigrations(pool, logger);
    repo = new PostgresUserRepo(toQueryRunner(pool));
  });

  afterAll(async () => {
    await pool.end();
  });

  beforeEach(async () => {
    await pool.query('DELETE FROM users');
  });

  it('should not reapply migrations', async () => {
    const logger = createLogger({ logLevel: 'info', serviceName: 'test', nodeEnv: 'test' });
    await expect(runMigrations(pool, logger)).resolves.toEqual([]);
  });

  it('should read back what it created', async () => {
    const created = await repo.create(User.create('Ada', 'ada@example.com', now));

    const loaded = await repo.getById(created.id);

    expect(loaded.getState()).toEqual({
      id: created.id,
      name: 'Ada',
      email: 'ada@example.com',
      version: 1,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    });
  });

  it('should enforce unique email among active users only', async () => {
    const first = await repo.create(User.create('Ada', 'ada@example.com', now));

    await expect(
      repo.create(User.create('Ada Two', 'ada@example.com', now))
    ).rejects.toBeInstanceOf(DuplicateEmailError);

    first.delete(now);
    await repo.update(first);

    const second = await repo.create(User.create('Ada Two', 'ada@example.com', now));
    expect(second.id).not.toBe(first.id);
    await expect(repo.getByEmail('ada@example.com')).resolves.toHaveProperty('id', second.id);
  });

  it('should let exactly one of two writers from the same version win', async () => {
    const created = await repo.create(User.create('Ada', 'ada@example.com', now));
    const a = await repo.getById(created.id);
    const b = await repo.getById(created.id);

    a.changeName('Ada A', now);
    b.changeName('Ada B', now);

    await repo.update(a);
    await expect(repo.update(b)).rejects.toBeInstanceOf(VersionConflictError);

    const stored = await repo.getById(created.id);
    expect(stored.name).toBe('Ada A');
    expect(stored.version).toBe(2);
  });

  it('should report a conflict for a row that no longer exists', async () => {
    const created = await repo.create(User.create('Ada', 'ada@example.com', now));
    await pool.query('DELETE FROM users WHERE id = $1', [created.id]);

    await expect(repo.update(created)).rejects.toBeInstanceOf(VersionConflictError);
    await expect(repo.getById(created.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should walk every active user exactly once in id order', async () => {
    const ids: string[] = [];
    for (let i = 0; i < 5; i++) {
      const user = await repo.create(User.create(`User ${i}`, `user${i}@example.com`, now));
      ids.push(user.id);
    }
    const deleted = await repo.getById(ids[2]);
    deleted.delete(now);
    await repo.update(deleted);

    const seen: string[] = [];
    let page = await repo.list({}, undefined, 2);
    seen.push(...page.users.map((u) => u.id));
    while (page.nextCursor) {
      page = await repo.list({}, page.nextCursor, 2);
      seen.push(...page.users.map((u) => u.id));
    }

    const expected = ids.filter((id) => id !== ids[2]).sort();
    expect(seen).toEqual(expected);
    await expect(repo.count({})).resolves.toBe(4);
    await expect(repo.count({ includeDeleted: true })).resolves.toBe(5);
  });

  it('should answer ping', async () => {
    await expect(repo.ping()).resolves.toBeUndefined();
  });
});
