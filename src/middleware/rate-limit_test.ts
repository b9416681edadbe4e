import { expect, test } from "vitest";
import { ClientRateLimiter } from "../concurrency/rate-limiter.ts";
import { ServerMetrics } from "../observability/metrics.ts";
import { createTestContext, recordingLogger } from "../testing/helpers.ts";
import { createRateLimitMiddleware } from "./rate-limit.ts";

const ok = async () => new Response("ok");

function clock() {
  let current = 0;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

test("rate limit middleware - passes everything through when disabled", async () => {
  const metrics = new ServerMetrics();
  const { log } = recordingLogger();
  const middleware = createRateLimitMiddleware(null, metrics, log);

  for (let i = 0; i < 50; i++) {
    const res = await middleware(createTestContext(), ok);
    expect(res.status).toBe(200);
  }
  expect(metrics.getSnapshot().counters.requests_rate_limited).toBe(0);
});

test("rate limit middleware - disabled limiter ignores malformed addresses", async () => {
  const { log, lines } = recordingLogger();
  const middleware = createRateLimitMiddleware(null, new ServerMetrics(), log);

  const res = await middleware(createTestContext({ remoteAddress: "bogus" }), ok);

  expect(res.status).toBe(200);
  expect(lines).toEqual([]);
});

test("rate limit middleware - 429 with Retry-After once the bucket is empty", async () => {
  const c = clock();
  const limiter = new ClientRateLimiter({ rps: 1, burst: 1, now: c.now });
  const metrics = new ServerMetrics();
  const { log } = recordingLogger();
  const middleware = createRateLimitMiddleware(limiter, metrics, log);
  let downstream = 0;
  const counted = async () => {
    downstream++;
    return new Response("ok");
  };

  expect((await middleware(createTestContext(), counted)).status).toBe(200);

  const limited = await middleware(createTestContext(), counted);
  expect(limited.status).toBe(429);
  expect(limited.headers.get("Retry-After")).toBe("1");
  expect(await limited.json()).toEqual({
    error: { code: "rate_limited", message: "rate limit exceeded" },
  });
  expect(downstream).toBe(1);
  expect(metrics.getSnapshot().counters.requests_rate_limited).toBe(1);

  c.advance(1000);
  expect((await middleware(createTestContext(), counted)).status).toBe(200);
});

test("rate limit middleware - Retry-After rounds up to whole seconds", async () => {
  const limiter = new ClientRateLimiter({ rps: 0.25, burst: 1, now: () => 0 });
  const middleware = createRateLimitMiddleware(
    limiter,
    new ServerMetrics(),
    recordingLogger().log,
  );

  await middleware(createTestContext(), ok);
  const limited = await middleware(createTestContext(), ok);

  expect(limited.headers.get("Retry-After")).toBe("4");
});

test("rate limit middleware - clients are keyed by host, not by port", async () => {
  const limiter = new ClientRateLimiter({ rps: 1, burst: 1, now: () => 0 });
  const middleware = createRateLimitMiddleware(
    limiter,
    new ServerMetrics(),
    recordingLogger().log,
  );

  const first = await middleware(
    createTestContext({ remoteAddress: "198.51.100.1:1111" }),
    ok,
  );
  const samehost = await middleware(
    createTestContext({ remoteAddress: "198.51.100.1:2222" }),
    ok,
  );
  const otherhost = await middleware(
    createTestContext({ remoteAddress: "[2001:db8::1]:1111" }),
    ok,
  );

  expect(first.status).toBe(200);
  expect(samehost.status).toBe(429);
  expect(otherhost.status).toBe(200);
});

test("rate limit middleware - malformed remote address is a logged 500", async () => {
  const limiter = new ClientRateLimiter({ rps: 1, burst: 1 });
  const { log, lines } = recordingLogger();
  const middleware = createRateLimitMiddleware(limiter, new ServerMetrics(), log);

  const res = await middleware(
    createTestContext({ remoteAddress: "198.51.100.1", requestId: "req-5" }),
    ok,
  );

  expect(res.status).toBe(500);
  expect(res.headers.get("Connection")).toBeNull();
  expect(lines).toEqual([
    '[ERROR] cannot derive client key from remote address "198.51.100.1": ' +
    "missing port in address (GET http://localhost/v1/movies request_id=req-5)",
  ]);
  expect(limiter.getMetrics().keys).toBe(0);
});
