import { isIP } from 'node:net';

const MAX_BIGINT = 9_223_372_036_854_775_807n;

export function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

export function toNullableDate(value: unknown): Date | null {
  return value === null || value === undefined ? null : toDate(value);
}

export function toNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

/**
 * Ids are BIGINT identities handed out as decimal strings. Anything else
 * cannot name a row, so callers treat it as "no such row".
 */
export function isRowId(id: string): boolean {
  return /^\d{1,19}$/.test(id) && BigInt(id) <= MAX_BIGINT;
}

/** INET column: keep only addresses Postgres can store. */
export function toInetOrNull(address: string | null): string | null {
  if (address === null) return null;
  const trimmed = address.trim();
  return isIP(trimmed) === 0 ? null : trimmed;
}
