export type {
  User,
  PublicUser,
  Session,
  SessionWithOwner,
  ClientMetadata,
} from './user';
export { toPublicUser } from './user';
export {
  COUNTRIES,
  ROLE_KINDS,
  isCountry,
  parseCountry,
  roleFor,
  isRoleOf,
  type Country,
  type RoleKind,
} from './country';
export {
  LOCKED_PASSWORD_HASH,
  isSessionExpired,
  isLockedPasswordHash,
  sessionExpiry,
} from './auth';
export {
  isAdminRole,
  canAccessInstance,
  canManageUsers,
  canDeleteUser,
} from './permissions';
export {
  AuthError,
  INVALID_CREDENTIALS,
  INVALID_SESSION,
  type AuthErrorKind,
  type PublicErrorCode,
} from './errors';
export type {
  UserRepository,
  SessionRepository,
  PasswordHasher,
  SessionTokenGenerator,
  WithTransaction,
  Clock,
} from './ports';
export {
  SessionService,
  DEFAULT_MAX_ISSUE_ATTEMPTS,
  type SessionServiceDeps,
  type SessionCheck,
  type SessionInvalidReason,
} from './session-service';
export { SessionReaper, type SessionReaperDeps } from './session-reaper';
export { AuthService, type AuthServiceDeps, type LoginResult } from './auth-service';
export { UserService, type UserServiceDeps, type CreateUserInput } from './user-service';
