import { type Country } from './country';
import { type User } from './user';

type Actor = Pick<User, 'country' | 'role'>;

export function isAdminRole(role: string): boolean {
  return role.startsWith('admin_');
}

/** Each deployment serves one country; users of another country are turned away. */
export function canAccessInstance(user: Pick<User, 'country'>, instanceCountry: Country): boolean {
  return user.country === instanceCountry;
}

export function canManageUsers(actor: Actor, country: Country): boolean {
  return isAdminRole(actor.role) && actor.country === country;
}

export function canDeleteUser(actor: Actor, target: Actor): boolean {
  if (isAdminRole(target.role)) return false;
  return canManageUsers(actor, target.country);
}
