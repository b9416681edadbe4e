/**
 * In-memory credential and permission stores, for development and tests.
 *
 * @module marquee/auth/memory-store
 */

import { generateToken } from "./tokens.ts";
import type {
  CredentialStore,
  InsertUserOutcome,
  Lookup,
  NewUser,
  PermissionStore,
  Token,
  TokenScope,
  User,
  UserStore,
} from "./types.ts";

interface StoredToken {
  userId: number;
  scope: TokenScope;
  expiry: Date;
}

/**
 * Map-backed {@link CredentialStore} and {@link UserStore}, sharing one set
 * of accounts. Keeps token fingerprints only.
 */
export class MemoryCredentialStore implements CredentialStore, UserStore {
  private users = new Map<number, User>();
  private passwordHashes = new Map<number, string>();
  private tokens = new Map<string, StoredToken>();
  private nextUserId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Add or replace a user, optionally with a password hash */
  putUser(user: User, passwordHash = ""): void {
    this.users.set(user.id, structuredClone(user));
    this.passwordHashes.set(user.id, passwordHash);
    this.nextUserId = Math.max(this.nextUserId, user.id + 1);
  }

  async insert(user: NewUser): Promise<InsertUserOutcome> {
    if (this.findByEmail(user.email)) {
      return { kind: "duplicate_email" };
    }
    const created: User = {
      id: this.nextUserId++,
      createdAt: this.now(),
      name: user.name,
      email: user.email,
      activated: false,
      version: 1,
    };
    this.users.set(created.id, created);
    this.passwordHashes.set(created.id, user.passwordHash);
    return { kind: "created", user: structuredClone(created) };
  }

  async get(id: number): Promise<User | null> {
    const user = this.users.get(id);
    return user ? structuredClone(user) : null;
  }

  async getByEmail(
    email: string,
  ): Promise<{ user: User; passwordHash: string } | null> {
    const user = this.findByEmail(email);
    if (!user) return null;
    return {
      user: structuredClone(user),
      passwordHash: this.passwordHashes.get(user.id) ?? "",
    };
  }

  async update(candidate: User): Promise<number | null> {
    const stored = this.users.get(candidate.id);
    if (!stored || stored.version !== candidate.version) {
      return null;
    }
    const version = stored.version + 1;
    this.users.set(candidate.id, {
      ...structuredClone(candidate),
      createdAt: stored.createdAt,
      version,
    });
    return version;
  }

  async getForToken(
    scope: TokenScope,
    fingerprint: string,
    now: Date,
  ): Promise<Lookup<User>> {
    const token = this.tokens.get(fingerprint);
    if (
      !token || token.scope !== scope ||
      token.expiry.getTime() <= now.getTime()
    ) {
      return { kind: "not_found" };
    }
    const user = this.users.get(token.userId);
    return user
      ? { kind: "found", value: structuredClone(user) }
      : { kind: "not_found" };
  }

  async issue(userId: number, ttlMs: number, scope: TokenScope): Promise<Token> {
    const token = generateToken(userId, ttlMs, scope, this.now());
    this.tokens.set(token.fingerprint, {
      userId,
      scope,
      expiry: token.expiry,
    });
    return token;
  }

  async revokeAllForUser(scope: TokenScope, userId: number): Promise<void> {
    for (const [fingerprint, token] of this.tokens) {
      if (token.scope === scope && token.userId === userId) {
        this.tokens.delete(fingerprint);
      }
    }
  }

  private findByEmail(email: string): User | undefined {
    const wanted = email.toLowerCase();
    for (const user of this.users.values()) {
      if (user.email.toLowerCase() === wanted) return user;
    }
    return undefined;
  }
}

/**
 * Map-backed {@link PermissionStore}.
 */
export class MemoryPermissionStore implements PermissionStore {
  private granted = new Map<number, Set<string>>();

  /** Grant permission codes to a user */
  grant(userId: number, ...codes: string[]): void {
    const set = this.granted.get(userId) ?? new Set<string>();
    for (const code of codes) set.add(code);
    this.granted.set(userId, set);
  }

  async getAllForUser(userId: number): Promise<readonly string[]> {
    return [...(this.granted.get(userId) ?? [])];
  }
}
