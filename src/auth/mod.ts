/**
 * Auth module for ApiServer.
 *
 * @module marquee/auth
 */

// Types
export { ANONYMOUS, TokenScope } from "./types.ts";
export type {
  CredentialStore,
  InsertUserOutcome,
  Lookup,
  NewUser,
  PermissionStore,
  Principal,
  Token,
  User,
  UserStore,
} from "./types.ts";

// Accounts
export { hashPassword, verifyPassword } from "./passwords.ts";
export {
  toUserJson,
  validateLogin,
  validateRegistration,
  validateTokenPlaintext,
} from "./users.ts";
export type { UserJson } from "./users.ts";

// Tokens
export {
  fingerprintToken,
  generateToken,
  isWellFormedToken,
  TOKEN_PLAINTEXT_LENGTH,
} from "./tokens.ts";

// Middleware and utilities
export {
  AuthError,
  contextGetPrincipal,
  contextSetPrincipal,
  createAuthenticateMiddleware,
  extractBearerToken,
} from "./middleware.ts";
export type {
  AuthenticateOptions,
  AuthErrorCode,
  BearerHeader,
} from "./middleware.ts";

// Authorization gates
export { createAuthorizer } from "./authorize.ts";
export type { Authorizer, GateContext, GatedHandler } from "./authorize.ts";

// Stores
export {
  MemoryCredentialStore,
  MemoryPermissionStore,
} from "./memory-store.ts";
export {
  PostgresCredentialStore,
  PostgresPermissionStore,
} from "./postgres-store.ts";
