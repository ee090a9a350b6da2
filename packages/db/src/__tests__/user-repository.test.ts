import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { PgUserRepository } from '../repositories/user-repository';
import { createTestDatabase, type TestDatabase } from './test-database';

describe('PgUserRepository', () => {
  let db: TestDatabase;
  const repo = new PgUserRepository();

  beforeAll(async () => {
    db = await createTestDatabase();
  });

  afterAll(async () => {
    await db.close();
  });

  beforeEach(async () => {
    await db.reset();
  });

  it('finds a seeded account by username', async () => {
    const user = await repo.findByUsername(db.client, 'chercheur_ch1');

    expect(user).toMatchObject({
      id: '6',
      username: 'chercheur_ch1',
      passwordHash: '!',
      country: 'SUISSE',
      role: 'chercheur_suisse',
      email: 'chercheur1@suisse.example',
      fullName: 'Chercheur Suisse 1',
      isActive: true,
      lastLogin: null,
    });
    expect(user?.createdAt).toBeInstanceOf(Date);
  });

  it('matches usernames case-sensitively', async () => {
    expect(await repo.findByUsername(db.client, 'ADMIN_FRANCE')).toBeNull();
  });

  it('creates a user and returns null on a duplicate username', async () => {
    const input = {
      username: 'chercheur_fr3',
      passwordHash: 'hashed:pw',
      country: 'FRANCE' as const,
      role: 'chercheur_france',
      email: null,
      fullName: null,
    };

    const created = await repo.create(db.client, input);
    expect(created).toMatchObject({ username: 'chercheur_fr3', isActive: true, email: null });
    expect(created && (await repo.findById(db.client, created.id))?.username).toBe('chercheur_fr3');

    expect(await repo.create(db.client, { ...input, passwordHash: 'hashed:other' })).toBeNull();
  });

  it('lists a country ordered by role', async () => {
    const users = await repo.listByCountry(db.client, 'FRANCE');
    expect(users.map((u) => u.role)).toEqual([
      'admin_france',
      'chercheur_france',
      'chercheur_france',
    ]);
  });

  it('lists a role newest first', async () => {
    const users = await repo.listByCountry(db.client, 'USA', 'chercheur_usa');
    // Seeded in one statement: same created_at, so id breaks the tie.
    expect(users.map((u) => u.username)).toEqual(['chercheur_us2', 'chercheur_us1']);
  });

  it('records the login time', async () => {
    const at = new Date('2024-03-01T12:00:00.000Z');
    await repo.recordLogin(db.client, '1', at);
    expect((await repo.findById(db.client, '1'))?.lastLogin?.toISOString()).toBe(
      '2024-03-01T12:00:00.000Z',
    );
  });

  it('reports whether updates touched a row', async () => {
    expect(await repo.setActive(db.client, '4', false)).toBe(true);
    expect((await repo.findById(db.client, '4'))?.isActive).toBe(false);
    expect(await repo.setActive(db.client, '999', false)).toBe(false);

    expect(await repo.setPasswordHash(db.client, '4', 'hashed:new')).toBe(true);
    expect((await repo.findById(db.client, '4'))?.passwordHash).toBe('hashed:new');
    expect(await repo.setPasswordHash(db.client, '999', 'hashed:new')).toBe(false);
  });

  it('deletes a user and cascades to its sessions', async () => {
    await db.client.query(
      `INSERT INTO sessions (user_id, token_hash, expires_at) VALUES ($1, $2, $3)`,
      ['5', 'hash-of-fr2', new Date('2099-01-01T00:00:00.000Z')],
    );

    expect(await repo.delete(db.client, '5')).toBe(true);
    expect(await repo.delete(db.client, '5')).toBe(false);

    const remaining = await db.client.query(`SELECT id FROM sessions WHERE user_id = $1`, ['5']);
    expect(remaining.rows).toEqual([]);
  });
});
