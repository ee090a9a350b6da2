import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { PgSessionRepository } from '../repositories/session-repository';
import { PgUserRepository } from '../repositories/user-repository';
import { createTestDatabase, type TestDatabase } from './test-database';

const T0 = new Date('2024-01-01T00:00:00.000Z');

function at(minutes: number): Date {
  return new Date(T0.getTime() + minutes * 60_000);
}

describe('PgSessionRepository', () => {
  let db: TestDatabase;
  const repo = new PgSessionRepository();

  beforeAll(async () => {
    db = await createTestDatabase();
  });

  afterAll(async () => {
    await db.close();
  });

  beforeEach(async () => {
    await db.reset();
  });

  function insert(userId: string, tokenHash: string, expiresAt: Date) {
    return repo.create(db.client, {
      userId,
      tokenHash,
      expiresAt,
      createdAt: T0,
      sourceAddress: null,
      clientDescriptor: null,
    });
  }

  it('stores a session with its client metadata', async () => {
    const session = await repo.create(db.client, {
      userId: '4',
      tokenHash: 'hash-a',
      expiresAt: at(60),
      createdAt: T0,
      sourceAddress: '10.0.0.7',
      clientDescriptor: 'curl/8.4.0',
    });

    expect(session).toMatchObject({
      userId: '4',
      tokenHash: 'hash-a',
      sourceAddress: '10.0.0.7',
      clientDescriptor: 'curl/8.4.0',
    });
    expect(session?.expiresAt.toISOString()).toBe('2024-01-01T01:00:00.000Z');
    expect(session?.createdAt.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('returns null when the token hash is already taken', async () => {
    expect(await insert('4', 'hash-a', at(60))).not.toBeNull();
    expect(await insert('5', 'hash-a', at(60))).toBeNull();

    const found = await repo.findByTokenHash(db.client, 'hash-a');
    expect(found?.userId).toBe('4');
  });

  it('joins the owner active flag', async () => {
    await insert('4', 'hash-a', at(60));
    expect((await repo.findByTokenHash(db.client, 'hash-a'))?.ownerActive).toBe(true);

    await new PgUserRepository().setActive(db.client, '4', false);
    expect((await repo.findByTokenHash(db.client, 'hash-a'))?.ownerActive).toBe(false);
  });

  it('returns null for an unknown hash', async () => {
    expect(await repo.findByTokenHash(db.client, 'nope')).toBeNull();
  });

  it('deletes by hash once', async () => {
    await insert('4', 'hash-a', at(60));

    expect(await repo.deleteByTokenHash(db.client, 'hash-a')).toBe(true);
    expect(await repo.deleteByTokenHash(db.client, 'hash-a')).toBe(false);
  });

  it('deletes every session of one user only', async () => {
    await insert('4', 'hash-a', at(60));
    await insert('4', 'hash-b', at(120));
    await insert('5', 'hash-c', at(60));

    expect(await repo.deleteAllForUser(db.client, '4')).toBe(2);
    expect(await repo.findByTokenHash(db.client, 'hash-c')).not.toBeNull();
  });

  it('deletes exactly the sessions expired at the cutoff', async () => {
    await insert('4', 'past', at(-1));
    await insert('4', 'boundary', at(30));
    await insert('5', 'future', at(31));

    expect(await repo.deleteExpired(db.client, at(30))).toBe(2);
    expect(await repo.deleteExpired(db.client, at(30))).toBe(0);

    const left = await db.client.query('SELECT token_hash FROM sessions ORDER BY token_hash');
    expect(left.rows.map((r) => r.token_hash)).toEqual(['future']);
  });

  it('keeps the manual cleanup function in step with the wall clock', async () => {
    const now = Date.now();
    await insert('4', 'stale', new Date(now - 60_000));
    await insert('4', 'fresh', new Date(now + 3_600_000));

    const result = await db.client.query('SELECT cleanup_expired_sessions() AS deleted');
    expect(result.rows[0]?.deleted).toBe(1);

    const left = await db.client.query('SELECT token_hash FROM sessions');
    expect(left.rows.map((r) => r.token_hash)).toEqual(['fresh']);
  });
});

describe('reporting views', () => {
  let db: TestDatabase;

  beforeAll(async () => {
    db = await createTestDatabase();
  });

  afterAll(async () => {
    await db.close();
  });

  it('counts users per country and role', async () => {
    await new PgUserRepository().setActive(db.client, '5', false);

    const result = await db.client.query(
      `SELECT role, user_count, active_count, recent_login_count
       FROM v_users_by_country WHERE country = 'FRANCE' ORDER BY role`,
    );

    expect(result.rows).toEqual([
      { role: 'admin_france', user_count: '1', active_count: '1', recent_login_count: '0' },
      { role: 'chercheur_france', user_count: '2', active_count: '1', recent_login_count: '0' },
    ]);
  });

  it('lists only unexpired sessions with their owner', async () => {
    const repo = new PgSessionRepository();
    const now = Date.now();
    for (const [tokenHash, offset] of [
      ['live', 3_600_000],
      ['dead', -60_000],
    ] as const) {
      await repo.create(db.client, {
        userId: '7',
        tokenHash,
        expiresAt: new Date(now + offset),
        createdAt: new Date(now - 120_000),
        sourceAddress: '192.0.2.1',
        clientDescriptor: null,
      });
    }

    const result = await db.client.query(
      'SELECT token_hash, username, country, role, source_address FROM v_active_sessions',
    );

    expect(result.rows).toEqual([
      {
        token_hash: 'live',
        username: 'chercheur_us1',
        country: 'USA',
        role: 'chercheur_usa',
        source_address: '192.0.2.1',
      },
    ]);
  });
});
