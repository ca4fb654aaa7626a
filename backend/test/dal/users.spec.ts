import { describe, it, expect } from 'vitest';
import { TimeoutError } from '../../src/shared/async/with-timeout';
import { StoreUnavailableError } from '../../src/shared/errors/infra-errors';
import { DuplicateEmailError, KyselyCredentialStore } from '../../src/modules/users';
import { affected, createRecordingDb, rows, type QueryHandler } from '../helpers/recording-db';

const CREATED_AT = new Date('2026-03-01T12:00:00.000Z');

const ALICE_ROW = {
  id: '7d0e4c7a-1111-4222-8333-444455556666',
  email: 'alice@example.com',
  password_hash: 'fake-hash:correct-horse-battery',
  email_verified: false,
  created_at: CREATED_AT,
  updated_at: CREATED_AT,
};

function makeStore(handler: QueryHandler, timeoutMs = 1000) {
  const { db, queries } = createRecordingDb(handler);
  return { store: new KyselyCredentialStore(db, { timeoutMs }), queries };
}

async function captureStoreError(promise: Promise<unknown>): Promise<StoreUnavailableError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof StoreUnavailableError) return err;
    throw err;
  }
  throw new Error('expected a StoreUnavailableError');
}

describe('users DAL (KyselyCredentialStore)', () => {
  it('findByEmail selects by email and maps the row', async () => {
    const { store, queries } = makeStore(() => rows(ALICE_ROW));

    const principal = await store.findByEmail('alice@example.com');

    expect(queries).toEqual([
      { sql: 'select * from "users" where "email" = $1', parameters: ['alice@example.com'] },
    ]);
    expect(principal).toEqual({
      id: ALICE_ROW.id,
      email: 'alice@example.com',
      passwordHash: 'fake-hash:correct-horse-battery',
      verified: false,
      createdAt: CREATED_AT,
    });
  });

  it('findById returns null when no row matches', async () => {
    const { store, queries } = makeStore(() => rows());

    expect(await store.findById('missing')).toBeNull();
    expect(queries[0]?.sql).toBe('select * from "users" where "id" = $1');
  });

  it('save inserts email and hash and returns the stored principal', async () => {
    const { store, queries } = makeStore(() => rows(ALICE_ROW));

    const principal = await store.save({
      email: 'alice@example.com',
      passwordHash: 'fake-hash:correct-horse-battery',
    });

    expect(queries).toEqual([
      {
        sql: 'insert into "users" ("email", "password_hash") values ($1, $2) returning *',
        parameters: ['alice@example.com', 'fake-hash:correct-horse-battery'],
      },
    ]);
    expect(principal.id).toBe(ALICE_ROW.id);
    expect(principal.verified).toBe(false);
  });

  it('save maps a unique violation to DuplicateEmailError', async () => {
    const { store } = makeStore(() =>
      Promise.reject(Object.assign(new Error('duplicate key value'), { code: '23505' })),
    );

    await expect(
      store.save({ email: 'alice@example.com', passwordHash: 'fake-hash:x' }),
    ).rejects.toBeInstanceOf(DuplicateEmailError);
  });

  it('setVerified reports whether a row was updated', async () => {
    const updated = makeStore(() => affected(1n));
    const missing = makeStore(() => affected(0n));

    expect(await updated.store.setVerified(ALICE_ROW.id)).toBe(true);
    expect(await missing.store.setVerified('missing')).toBe(false);

    const query = updated.queries[0];
    expect(query?.sql).toBe(
      'update "users" set "email_verified" = $1, "updated_at" = $2 where "id" = $3',
    );
    expect(query?.parameters[0]).toBe(true);
    expect(query?.parameters[2]).toBe(ALICE_ROW.id);
  });

  it('updatePasswordHash writes the new hash', async () => {
    const { store, queries } = makeStore(() => affected(1n));

    expect(await store.updatePasswordHash(ALICE_ROW.id, 'fake-hash:new')).toBe(true);
    expect(queries[0]?.sql).toBe(
      'update "users" set "password_hash" = $1, "updated_at" = $2 where "id" = $3',
    );
    expect(queries[0]?.parameters[0]).toBe('fake-hash:new');
  });

  it('wraps driver failures in StoreUnavailableError', async () => {
    const cause = new Error('connection refused');
    const { store } = makeStore(() => Promise.reject(cause));

    const err = await captureStoreError(store.findByEmail('alice@example.com'));

    expect(err.operation).toBe('find_by_email');
    expect(err.cause).toBe(cause);
  });

  it('gives up on a query that outlives the timeout', async () => {
    const { store } = makeStore(() => new Promise(() => undefined), 20);

    const err = await captureStoreError(store.findById(ALICE_ROW.id));

    expect(err.operation).toBe('find_by_id');
    expect(err.cause).toBeInstanceOf(TimeoutError);
  });
});
