import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { createTestDb } from '../helpers/pglite-dialect';
import type { Db } from '../../src/shared/db/db';
import { ensureSchema } from '../../src/shared/db/ensure-schema';
import { runInUnitOfWork } from '../../src/shared/db/unit-of-work';
import { ok } from '../../src/shared/http/result';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { selectUserByIdSql } from '../../src/modules/users/dal/user.query-sql';
import { getUserById } from '../../src/modules/users';

describe('users DAL', () => {
  let db: Db;
  const repo = new UserRepo();
  const signal = new AbortController().signal;

  beforeEach(async () => {
    db = createTestDb();
    await ensureSchema(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('create inserts a user and getUserById shapes it', async () => {
    const created = await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { mail: 'alice@example.com', passwordHash: 'hash-a' }),
    );
    expect(created).toEqual({ ok: true, value: { id: 1 } });

    const row = await selectUserByIdSql(db, 1);
    expect(row).toEqual({ id: 1, mail: 'alice@example.com', password: 'hash-a' });

    const user = await getUserById(db, 1);
    expect(user).toEqual({ id: 1, mail: 'alice@example.com', passwordHash: 'hash-a' });
  });

  it('keeps mail as given (no normalization)', async () => {
    await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { mail: 'Bob@Example.COM', passwordHash: 'h' }),
    );
    expect((await getUserById(db, 1))?.mail).toBe('Bob@Example.COM');
  });

  it('create returns CONFLICT for a duplicate mail and leaves one row', async () => {
    await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { mail: 'dup@example.com', passwordHash: 'h1' }),
    );

    const again = await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { mail: 'dup@example.com', passwordHash: 'h2' }),
    );

    expect(again.ok).toBe(false);
    if (again.ok) return;
    expect(again.error.status).toBe(409);
    expect(again.error.message).toBe('User already exists');

    const rows = await db.selectFrom('app_users').selectAll().execute();
    expect(rows).toEqual([{ id: 1, mail: 'dup@example.com', password: 'h1' }]);
  });

  it('fetchOrNotFound returns NOT_FOUND for an unknown id', async () => {
    const res = await runInUnitOfWork(db, signal, (uow) => repo.fetchOrNotFound(uow, 42));
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.status).toBe(404);
    expect(res.error.message).toBe('User not found');
  });

  it('remove deletes the row', async () => {
    await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { mail: 'gone@example.com', passwordHash: 'h' }),
    );

    const res = await runInUnitOfWork(db, signal, async (uow) => {
      const user = await repo.fetchOrNotFound(uow, 1);
      if (!user.ok) return user;
      return repo.remove(uow, user.value);
    });

    expect(res).toEqual({ ok: true, value: { status: 'deleted' } });
    expect(await getUserById(db, 1)).toBeUndefined();
  });

  it('remove of a row that is already gone is NOT_FOUND and rolls the unit back', async () => {
    await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { mail: 'twice@example.com', passwordHash: 'h' }),
    );

    const res = await runInUnitOfWork(db, signal, async (uow) => {
      const user = await repo.fetchOrNotFound(uow, 1);
      if (!user.ok) return user;

      const first = await repo.remove(uow, user.value);
      expect(first).toEqual({ ok: true, value: { status: 'deleted' } });

      // same snapshot, row no longer there
      return repo.remove(uow, user.value);
    });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.status).toBe(404);
    expect(res.error.message).toBe('User not found');

    // the error value rolled back the first delete as well
    expect(await getUserById(db, 1)).toEqual({
      id: 1,
      mail: 'twice@example.com',
      passwordHash: 'h',
    });
  });

  it('returns entities as snapshots that survive commit', async () => {
    const res = await runInUnitOfWork(db, signal, async (uow) => {
      await repo.create(uow, { mail: 'snap@example.com', passwordHash: 'h' });
      const user = await repo.fetchOrNotFound(uow, 1);
      if (!user.ok) return user;
      await repo.remove(uow, user.value);
      return ok(user.value);
    });

    expect(res).toEqual({
      ok: true,
      value: { id: 1, mail: 'snap@example.com', passwordHash: 'h' },
    });
  });
});
