/**
 * Postgres credential and permission stores.
 *
 * Tokens are stored by the raw bytes of their SHA-256 fingerprint
 * (`tokens.hash bytea`); fingerprints travel as hex and are decoded in SQL.
 *
 * @module marquee/auth/postgres-store
 */

import {
  type Queryable,
  readBoolean,
  readDate,
  readInt,
  readString,
  type Row,
  withDeadline,
} from "../data/postgres.ts";
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

const USER_COLUMNS =
  "users.id, users.created_at, users.name, users.email, users.activated, users.version";

function toUser(row: Row): User {
  return {
    id: readInt(row, "id"),
    createdAt: readDate(row, "created_at"),
    name: readString(row, "name"),
    email: readString(row, "email"),
    activated: readBoolean(row, "activated"),
    version: readInt(row, "version"),
  };
}

/** unique_violation on the email constraint */
function isDuplicateEmail(error: unknown): boolean {
  return typeof error === "object" && error !== null &&
    "code" in error && error.code === "23505" &&
    "constraint" in error && error.constraint === "users_email_key";
}

/**
 * {@link CredentialStore} and {@link UserStore} over the `users` and
 * `tokens` tables.
 */
export class PostgresCredentialStore implements CredentialStore, UserStore {
  constructor(
    private readonly db: Queryable,
    private readonly timeoutMs: number,
  ) {}

  async getForToken(
    scope: TokenScope,
    fingerprint: string,
    now: Date,
  ): Promise<Lookup<User>> {
    try {
      const user = await withDeadline(
        this.timeoutMs,
        "tokens.getForToken",
        async () => {
          const result = await this.db.query(
            `SELECT ${USER_COLUMNS}
             FROM users
             INNER JOIN tokens ON users.id = tokens.user_id
             WHERE tokens.hash = decode($1, 'hex')
             AND tokens.scope = $2
             AND tokens.expiry > $3`,
            [fingerprint, scope, now],
          );
          const row = result.rows[0];
          return row ? toUser(row) : null;
        },
      );
      return user ? { kind: "found", value: user } : { kind: "not_found" };
    } catch (error) {
      return { kind: "failed", error };
    }
  }

  issue(userId: number, ttlMs: number, scope: TokenScope): Promise<Token> {
    return withDeadline(this.timeoutMs, "tokens.issue", async () => {
      const token = generateToken(userId, ttlMs, scope);
      await this.db.query(
        `INSERT INTO tokens (hash, user_id, expiry, scope)
         VALUES (decode($1, 'hex'), $2, $3, $4)`,
        [token.fingerprint, token.userId, token.expiry, token.scope],
      );
      return token;
    });
  }

  revokeAllForUser(scope: TokenScope, userId: number): Promise<void> {
    return withDeadline(this.timeoutMs, "tokens.revokeAllForUser", async () => {
      await this.db.query(
        "DELETE FROM tokens WHERE scope = $1 AND user_id = $2",
        [scope, userId],
      );
    });
  }

  insert(user: NewUser): Promise<InsertUserOutcome> {
    return withDeadline(this.timeoutMs, "users.insert", async () => {
      try {
        const result = await this.db.query(
          `INSERT INTO users (name, email, password_hash, activated)
           VALUES ($1, $2, $3, false)
           RETURNING id, created_at, version`,
          [user.name, user.email, user.passwordHash],
        );
        const row = result.rows[0];
        if (!row) throw new Error("insert returned no row");
        return {
          kind: "created",
          user: {
            id: readInt(row, "id"),
            createdAt: readDate(row, "created_at"),
            name: user.name,
            email: user.email,
            activated: false,
            version: readInt(row, "version"),
          },
        };
      } catch (error) {
        if (isDuplicateEmail(error)) return { kind: "duplicate_email" };
        throw error;
      }
    });
  }

  get(id: number): Promise<User | null> {
    return withDeadline(this.timeoutMs, "users.get", async () => {
      const result = await this.db.query(
        `SELECT ${USER_COLUMNS} FROM users WHERE users.id = $1`,
        [id],
      );
      const row = result.rows[0];
      return row ? toUser(row) : null;
    });
  }

  getByEmail(
    email: string,
  ): Promise<{ user: User; passwordHash: string } | null> {
    return withDeadline(this.timeoutMs, "users.getByEmail", async () => {
      const result = await this.db.query(
        `SELECT ${USER_COLUMNS}, users.password_hash
         FROM users WHERE users.email = $1`,
        [email],
      );
      const row = result.rows[0];
      return row
        ? { user: toUser(row), passwordHash: readString(row, "password_hash") }
        : null;
    });
  }

  update(candidate: User): Promise<number | null> {
    return withDeadline(this.timeoutMs, "users.update", async () => {
      const result = await this.db.query(
        `UPDATE users
         SET name = $1, email = $2, activated = $3, version = version + 1
         WHERE id = $4 AND version = $5
         RETURNING version`,
        [
          candidate.name,
          candidate.email,
          candidate.activated,
          candidate.id,
          candidate.version,
        ],
      );
      const row = result.rows[0];
      return row ? readInt(row, "version") : null;
    });
  }
}

/**
 * {@link PermissionStore} over `permissions` and `users_permissions`.
 */
export class PostgresPermissionStore implements PermissionStore {
  constructor(
    private readonly db: Queryable,
    private readonly timeoutMs: number,
  ) {}

  getAllForUser(userId: number): Promise<readonly string[]> {
    return withDeadline(this.timeoutMs, "permissions.getAllForUser", async () => {
      const result = await this.db.query(
        `SELECT permissions.code
         FROM permissions
         INNER JOIN users_permissions
           ON users_permissions.permission_id = permissions.id
         WHERE users_permissions.user_id = $1`,
        [userId],
      );
      return result.rows.map((row) => readString(row, "code"));
    });
  }
}
