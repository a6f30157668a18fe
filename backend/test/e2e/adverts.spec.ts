import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

type IdResponseBody = { id: number };
type AdvertResponseBody = {
  id: number;
  name: string;
  description: string;
  created_at: string;
  owner_id: number;
};
type ErrorResponseBody = { error: string };

function readJson<T>(res: { json: () => unknown }): T {
  return res.json() as T;
}

type TestApp = Awaited<ReturnType<typeof buildTestApp>>['app'];

async function createUser(app: TestApp, mail: string): Promise<number> {
  const res = await app.inject({ method: 'POST', url: '/user', payload: { mail, password: 'pw' } });
  expect(res.statusCode).toBe(200);
  return readJson<IdResponseBody>(res).id;
}

async function createAdvert(
  app: TestApp,
  payload: { name: string; description: string; owner_id: number | string },
): Promise<number> {
  const res = await app.inject({ method: 'POST', url: '/advert', payload });
  expect(res.statusCode).toBe(200);
  return readJson<IdResponseBody>(res).id;
}

describe('adverts endpoints', () => {
  it('create → read round-trips the input plus id and ISO created_at', async () => {
    const { app, close } = await buildTestApp();

    try {
      const id = await createAdvert(app, { name: 'n', description: 'd', owner_id: 1 });

      const res = await app.inject({ method: 'GET', url: `/advert/${id}` });
      expect(res.statusCode).toBe(200);

      const body = readJson<AdvertResponseBody>(res);
      expect(body).toMatchObject({ id, name: 'n', description: 'd', owner_id: 1 });
      expect(body.created_at).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
      expect(new Date(body.created_at).toISOString()).toBe(body.created_at);
    } finally {
      await close();
    }
  });

  it('coerces a numeric-string owner_id', async () => {
    const { app, close } = await buildTestApp();

    try {
      const id = await createAdvert(app, { name: 'n', description: 'd', owner_id: '4' });
      const res = await app.inject({ method: 'GET', url: `/advert/${id}` });
      expect(readJson<AdvertResponseBody>(res).owner_id).toBe(4);
    } finally {
      await close();
    }
  });

  it('rejects a duplicate name with 409 and keeps the first advert', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      await createAdvert(app, { name: 'bike', description: 'first', owner_id: 1 });

      const dup = await app.inject({
        method: 'POST',
        url: '/advert',
        payload: { name: 'bike', description: 'second', owner_id: 2 },
      });
      expect(dup.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(dup)).toEqual({ error: 'Advert already exists' });

      const rows = await deps.db.selectFrom('app_adverts').select('description').execute();
      expect(rows).toEqual([{ description: 'first' }]);
    } finally {
      await close();
    }
  });

  it('rejects invalid bodies with 400', async () => {
    const { app, close } = await buildTestApp();

    try {
      const missing = await app.inject({
        method: 'POST',
        url: '/advert',
        payload: { name: 'n', owner_id: 1 },
      });
      expect(missing.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(missing)).toEqual({ error: 'description: Required' });

      const tooLong = await app.inject({
        method: 'POST',
        url: '/advert',
        payload: { name: 'n'.repeat(101), description: 'd', owner_id: 1 },
      });
      expect(tooLong.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(tooLong)).toEqual({
        error: 'name: String must contain at most 100 character(s)',
      });

      const badOwner = await app.inject({
        method: 'POST',
        url: '/advert',
        payload: { name: 'n', description: 'd', owner_id: 'abc' },
      });
      expect(badOwner.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(badOwner)).toEqual({
        error: 'owner_id: Expected a whole number',
      });
    } finally {
      await close();
    }
  });

  it('authorization gate: only the stated owner deletes', async () => {
    const { app, close } = await buildTestApp();

    try {
      const u1 = await createUser(app, 'owner@x.com');
      const u2 = await createUser(app, 'other@x.com');
      const id = await createAdvert(app, { name: 'n', description: 'd', owner_id: u1 });

      const forbidden = await app.inject({
        method: 'DELETE',
        url: `/advert/${id}`,
        payload: { owner_id: u2 },
      });
      expect(forbidden.statusCode).toBe(403);
      expect(readJson<ErrorResponseBody>(forbidden)).toEqual({ error: 'User is not the owner' });

      const stillThere = await app.inject({ method: 'GET', url: `/advert/${id}` });
      expect(stillThere.statusCode).toBe(200);

      const allowed = await app.inject({
        method: 'DELETE',
        url: `/advert/${id}`,
        payload: { owner_id: u1 },
      });
      expect(allowed.statusCode).toBe(200);
      expect(allowed.json()).toEqual({ status: 'deleted' });

      const gone = await app.inject({ method: 'GET', url: `/advert/${id}` });
      expect(gone.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(gone)).toEqual({ error: 'Advert not found' });
    } finally {
      await close();
    }
  });

  it('delete of an unknown advert is 404 whatever owner_id holds', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'DELETE',
        url: '/advert/7',
        payload: { owner_id: 'not-a-number' },
      });
      expect(res.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(res)).toEqual({ error: 'Advert not found' });

      // a body that is not JSON at all is refused by the parser before the lookup
      const unparsable = await app.inject({
        method: 'DELETE',
        url: '/advert/7',
        headers: { 'content-type': 'application/json' },
        payload: '{"owner_id": ',
      });
      expect(unparsable.statusCode).toBe(400);
    } finally {
      await close();
    }
  });

  it('delete with an unknown or missing acting user is 404 and keeps the advert', async () => {
    const { app, close } = await buildTestApp();

    try {
      const id = await createAdvert(app, { name: 'n', description: 'd', owner_id: 1 });

      const unknownUser = await app.inject({
        method: 'DELETE',
        url: `/advert/${id}`,
        payload: { owner_id: 1 },
      });
      expect(unknownUser.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(unknownUser)).toEqual({ error: 'User not found' });

      const noBody = await app.inject({ method: 'DELETE', url: `/advert/${id}` });
      expect(noBody.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(noBody)).toEqual({ error: 'User not found' });

      const badBody = await app.inject({
        method: 'DELETE',
        url: `/advert/${id}`,
        payload: { owner_id: 'x' },
      });
      expect(badBody.statusCode).toBe(400);

      const read = await app.inject({ method: 'GET', url: `/advert/${id}` });
      expect(read.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('concurrent submissions with the same name: exactly one wins', async () => {
    const { app, deps, close } = await buildTestApp();

    try {
      const results = await Promise.all(
        ['d1', 'd2'].map((description) =>
          app.inject({
            method: 'POST',
            url: '/advert',
            payload: { name: 'same', description, owner_id: 1 },
          }),
        ),
      );

      expect(results.map((r) => r.statusCode).sort()).toEqual([200, 409]);

      const rows = await deps.db.selectFrom('app_adverts').select('name').execute();
      expect(rows).toEqual([{ name: 'same' }]);
    } finally {
      await close();
    }
  });
});
