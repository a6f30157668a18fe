import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { createTestDb } from '../helpers/pglite-dialect';
import type { Db } from '../../src/shared/db/db';
import { ensureSchema } from '../../src/shared/db/ensure-schema';
import { runInUnitOfWork } from '../../src/shared/db/unit-of-work';
import { AdvertRepo } from '../../src/modules/adverts/dal/advert.repo';
import { getAdvertById } from '../../src/modules/adverts';

describe('adverts DAL', () => {
  let db: Db;
  const repo = new AdvertRepo();
  const signal = new AbortController().signal;

  beforeEach(async () => {
    db = createTestDb();
    await ensureSchema(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('create stores the advert with a server-assigned created_at', async () => {
    const before = Date.now();

    const created = await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { name: 'bike', description: 'red bike', ownerId: 5 }),
    );
    expect(created).toEqual({ ok: true, value: { id: 1 } });

    const advert = await getAdvertById(db, 1);
    expect(advert).toMatchObject({ id: 1, name: 'bike', description: 'red bike', ownerId: 5 });
    expect(advert?.createdAt).toBeInstanceOf(Date);
    // DB clock vs test clock: allow a little skew
    expect(advert?.createdAt.getTime()).toBeGreaterThan(before - 5_000);
  });

  it('accepts an owner_id that names no user (weak reference)', async () => {
    const created = await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { name: 'orphan', description: 'd', ownerId: 999 }),
    );
    expect(created.ok).toBe(true);
  });

  it('create returns CONFLICT for a duplicate name', async () => {
    await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { name: 'bike', description: 'd1', ownerId: 1 }),
    );
    const again = await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { name: 'bike', description: 'd2', ownerId: 2 }),
    );

    expect(again.ok).toBe(false);
    if (again.ok) return;
    expect(again.error.code).toBe('CONFLICT');
    expect(again.error.message).toBe('Advert already exists');
    expect(again.error.meta).toEqual({ constraint: 'app_adverts_name_key' });

    const rows = await db.selectFrom('app_adverts').select(['id', 'description']).execute();
    expect(rows).toEqual([{ id: 1, description: 'd1' }]);
  });

  it('fetchOrNotFound returns NOT_FOUND for an unknown id', async () => {
    const res = await runInUnitOfWork(db, signal, (uow) => repo.fetchOrNotFound(uow, 3));
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe('Advert not found');
  });

  it('remove reports NOT_FOUND when the row was deleted after it was fetched', async () => {
    await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { name: 'lamp', description: 'd', ownerId: 1 }),
    );

    const res = await runInUnitOfWork(db, signal, async (uow) => {
      const advert = await repo.fetchOrNotFound(uow, 1);
      if (!advert.ok) return advert;

      await repo.remove(uow, advert.value);
      return repo.remove(uow, advert.value);
    });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.status).toBe(404);
    expect(res.error.message).toBe('Advert not found');
    expect((await getAdvertById(db, 1))?.name).toBe('lamp');
  });

  it('ensureSchema is idempotent', async () => {
    await runInUnitOfWork(db, signal, (uow) =>
      repo.create(uow, { name: 'kept', description: 'd', ownerId: 1 }),
    );
    await ensureSchema(db);
    expect((await getAdvertById(db, 1))?.name).toBe('kept');
  });
});
