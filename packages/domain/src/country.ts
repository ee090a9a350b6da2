import { AuthError } from './errors';

export const COUNTRIES = ['FRANCE', 'SUISSE', 'USA'] as const;

export type Country = (typeof COUNTRIES)[number];

export const ROLE_KINDS = ['admin', 'chercheur'] as const;

export type RoleKind = (typeof ROLE_KINDS)[number];

const ROLE_SUFFIX: Record<Country, string> = {
  FRANCE: 'france',
  SUISSE: 'suisse',
  USA: 'usa',
};

export function isCountry(value: string): value is Country {
  return COUNTRIES.some((country) => country === value);
}

export function parseCountry(value: string): Country {
  const normalized = value.trim().toUpperCase();
  if (!isCountry(normalized)) {
    throw new AuthError('VALIDATION', `Unknown country '${value}'`, {
      allowed: [...COUNTRIES],
    });
  }
  return normalized;
}

/** e.g. roleFor('chercheur', 'SUISSE') === 'chercheur_suisse' */
export function roleFor(kind: RoleKind, country: Country): string {
  return `${kind}_${ROLE_SUFFIX[country]}`;
}

/** True when `role` is one of the role names of `country`. */
export function isRoleOf(role: string, country: Country): boolean {
  return ROLE_KINDS.some((kind) => roleFor(kind, country) === role);
}
