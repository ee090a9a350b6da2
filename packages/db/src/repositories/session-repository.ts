import {
  type Session,
  type SessionWithOwner,
  type SessionRepository,
} from '@epistat/domain';
import { type SqlClient } from '../client';
import { isRowId, toDate, toInetOrNull, toNullableString } from '../rows';

export class PgSessionRepository implements SessionRepository {
  async create(
    tx: unknown,
    session: {
      userId: string;
      tokenHash: string;
      expiresAt: Date;
      createdAt: Date;
      sourceAddress: string | null;
      clientDescriptor: string | null;
    },
  ): Promise<Session | null> {
    const client = tx as SqlClient;
    const result = await client.query(
      `INSERT INTO sessions (user_id, token_hash, expires_at, created_at, source_address, client_descriptor)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (token_hash) DO NOTHING
       RETURNING id, user_id, token_hash, expires_at, created_at, source_address, client_descriptor`,
      [
        session.userId,
        session.tokenHash,
        session.expiresAt,
        session.createdAt,
        toInetOrNull(session.sourceAddress),
        session.clientDescriptor,
      ],
    );
    return result.rows[0] ? mapSessionRow(result.rows[0]) : null;
  }

  async findByTokenHash(tx: unknown, tokenHash: string): Promise<SessionWithOwner | null> {
    const client = tx as SqlClient;
    const result = await client.query(
      `SELECT s.id, s.user_id, s.token_hash, s.expires_at, s.created_at,
              s.source_address, s.client_descriptor, u.is_active AS owner_active
       FROM sessions s
       JOIN users u ON u.id = s.user_id
       WHERE s.token_hash = $1`,
      [tokenHash],
    );
    const row = result.rows[0];
    if (!row) return null;
    return { ...mapSessionRow(row), ownerActive: row.owner_active === true };
  }

  async deleteByTokenHash(tx: unknown, tokenHash: string): Promise<boolean> {
    const client = tx as SqlClient;
    const result = await client.query(`DELETE FROM sessions WHERE token_hash = $1`, [tokenHash]);
    return (result.rowCount ?? 0) > 0;
  }

  async deleteAllForUser(tx: unknown, userId: string): Promise<number> {
    if (!isRowId(userId)) return 0;
    const client = tx as SqlClient;
    const result = await client.query(`DELETE FROM sessions WHERE user_id = $1`, [userId]);
    return result.rowCount ?? 0;
  }

  async deleteExpired(tx: unknown, now: Date): Promise<number> {
    const client = tx as SqlClient;
    const result = await client.query(`DELETE FROM sessions WHERE expires_at <= $1`, [now]);
    return result.rowCount ?? 0;
  }
}

function mapSessionRow(row: Record<string, unknown>): Session {
  return {
    id: String(row.id),
    userId: String(row.user_id),
    tokenHash: String(row.token_hash),
    expiresAt: toDate(row.expires_at),
    createdAt: toDate(row.created_at),
    sourceAddress: toNullableString(row.source_address),
    clientDescriptor: toNullableString(row.client_descriptor),
  };
}
