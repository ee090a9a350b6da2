import { type Country, type User, type UserRepository, parseCountry } from '@epistat/domain';
import { type SqlClient } from '../client';
import { isRowId, toDate, toNullableDate, toNullableString } from '../rows';

const USER_COLUMNS = `id, username, password_hash, country, role, email, full_name,
       is_active, created_at, last_login`;

export class PgUserRepository implements UserRepository {
  async create(
    tx: unknown,
    user: {
      username: string;
      passwordHash: string;
      country: Country;
      role: string;
      email: string | null;
      fullName: string | null;
    },
  ): Promise<User | null> {
    const client = tx as SqlClient;
    const result = await client.query(
      `INSERT INTO users (username, password_hash, country, role, email, full_name)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (username) DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [user.username, user.passwordHash, user.country, user.role, user.email, user.fullName],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByUsername(tx: unknown, username: string): Promise<User | null> {
    const client = tx as SqlClient;
    const result = await client.query(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE username = $1`,
      [username],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findById(tx: unknown, id: string): Promise<User | null> {
    if (!isRowId(id)) return null;
    const client = tx as SqlClient;
    const result = await client.query(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async listByCountry(tx: unknown, country: Country, role?: string): Promise<User[]> {
    const client = tx as SqlClient;
    const result =
      role === undefined
        ? await client.query(
            `SELECT ${USER_COLUMNS}
             FROM users
             WHERE country = $1
             ORDER BY role, created_at DESC, id DESC`,
            [country],
          )
        : await client.query(
            `SELECT ${USER_COLUMNS}
             FROM users
             WHERE country = $1 AND role = $2
             ORDER BY created_at DESC, id DESC`,
            [country, role],
          );
    return result.rows.map(mapUserRow);
  }

  async recordLogin(tx: unknown, id: string, at: Date): Promise<void> {
    if (!isRowId(id)) return;
    const client = tx as SqlClient;
    await client.query(`UPDATE users SET last_login = $2 WHERE id = $1`, [id, at]);
  }

  async setActive(tx: unknown, id: string, active: boolean): Promise<boolean> {
    if (!isRowId(id)) return false;
    const client = tx as SqlClient;
    const result = await client.query(`UPDATE users SET is_active = $2 WHERE id = $1`, [
      id,
      active,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async setPasswordHash(tx: unknown, id: string, passwordHash: string): Promise<boolean> {
    if (!isRowId(id)) return false;
    const client = tx as SqlClient;
    const result = await client.query(`UPDATE users SET password_hash = $2 WHERE id = $1`, [
      id,
      passwordHash,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  /** Sessions go with the user (ON DELETE CASCADE). */
  async delete(tx: unknown, id: string): Promise<boolean> {
    if (!isRowId(id)) return false;
    const client = tx as SqlClient;
    const result = await client.query(`DELETE FROM users WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

function mapUserRow(row: Record<string, unknown>): User {
  return {
    id: String(row.id),
    username: String(row.username),
    passwordHash: String(row.password_hash),
    country: parseCountry(String(row.country)),
    role: String(row.role),
    email: toNullableString(row.email),
    fullName: toNullableString(row.full_name),
    isActive: row.is_active === true,
    createdAt: toDate(row.created_at),
    lastLogin: toNullableDate(row.last_login),
  };
}
