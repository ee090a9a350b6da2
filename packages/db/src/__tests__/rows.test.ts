import { describe, it, expect } from 'vitest';
import { isRowId, toInetOrNull } from '../rows';

describe('isRowId', () => {
  it('accepts decimal ids within BIGINT range', () => {
    expect(isRowId('1')).toBe(true);
    expect(isRowId('9223372036854775807')).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isRowId('')).toBe(false);
    expect(isRowId('abc')).toBe(false);
    expect(isRowId('-1')).toBe(false);
    expect(isRowId('1.5')).toBe(false);
    expect(isRowId('9223372036854775808')).toBe(false);
    expect(isRowId('99999999999999999999')).toBe(false);
  });
});

describe('toInetOrNull', () => {
  it('keeps IPv4 and IPv6 addresses', () => {
    expect(toInetOrNull('203.0.113.9')).toBe('203.0.113.9');
    expect(toInetOrNull(' 2001:db8::1 ')).toBe('2001:db8::1');
  });

  it('drops values Postgres would refuse', () => {
    expect(toInetOrNull('unknown')).toBeNull();
    expect(toInetOrNull('')).toBeNull();
    expect(toInetOrNull(null)).toBeNull();
  });
});
