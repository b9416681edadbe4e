/**
 * Shared fixtures for the test suites.
 *
 * @module marquee/testing/helpers
 */

import type { User } from "../auth/types.ts";
import type { Queryable, Row } from "../data/postgres.ts";
import type { RequestContext } from "../middleware/types.ts";
import type { Logger } from "../types.ts";

export function createTestContext(
  overrides: {
    request?: Request;
    remoteAddress?: string;
    requestId?: string;
  } = {},
): RequestContext {
  return {
    request: overrides.request ?? new Request("http://localhost/v1/movies"),
    remoteAddress: overrides.remoteAddress ?? "203.0.113.7:51234",
    requestId: overrides.requestId ?? "req-1",
    receivedAt: 0,
    responseHeaders: new Headers(),
  };
}

export function createTestUser(overrides: Partial<User> = {}): User {
  return {
    id: 1,
    createdAt: new Date("2024-01-01T00:00:00Z"),
    name: "Test User",
    email: "user@example.com",
    activated: true,
    version: 1,
    ...overrides,
  };
}

/** Logger that keeps every line */
export function recordingLogger(): { log: Logger; lines: string[] } {
  const lines: string[] = [];
  return { log: (msg) => lines.push(msg), lines };
}

type QueryReply =
  | { rows: Row[]; rowCount?: number }
  | { error: unknown }
  | { hang: true };

/**
 * In-process stand-in for a pg Pool. Replies are consumed in order;
 * every call is recorded.
 */
export class FakeQueryable implements Queryable {
  readonly calls: Array<{ text: string; values: unknown[] }> = [];
  private replies: QueryReply[] = [];

  reply(reply: QueryReply): this {
    this.replies.push(reply);
    return this;
  }

  query(
    text: string,
    values: unknown[] = [],
  ): Promise<{ rows: Row[]; rowCount: number | null }> {
    this.calls.push({ text, values });
    const reply = this.replies.shift() ?? { rows: [] };
    if ("hang" in reply) {
      return new Promise(() => {});
    }
    if ("error" in reply) {
      return Promise.reject(reply.error);
    }
    return Promise.resolve({
      rows: reply.rows,
      rowCount: reply.rowCount ?? reply.rows.length,
    });
  }
}
