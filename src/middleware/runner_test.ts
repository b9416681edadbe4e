/**
 * Unit tests for middleware runner.
 *
 * Tests the onion-model middleware composition.
 */

import { expect, test } from "vitest";
import { createTestContext } from "../testing/helpers.ts";
import { createMiddlewareRunner } from "./runner.ts";
import type { Middleware } from "./types.ts";

const ok = async () => new Response("ok");

test("middleware runner - executes handler when no middlewares", async () => {
  const run = createMiddlewareRunner(
    [],
    async (ctx) => new Response(`hello ${ctx.requestId}`),
  );
  const res = await run(createTestContext({ requestId: "abc" }));
  expect(await res.text()).toBe("hello abc");
});

test("middleware runner - executes middlewares in onion order", async () => {
  const order: string[] = [];

  const m1: Middleware = async (_ctx, next) => {
    order.push("m1-before");
    const r = await next();
    order.push("m1-after");
    return r;
  };
  const m2: Middleware = async (_ctx, next) => {
    order.push("m2-before");
    const r = await next();
    order.push("m2-after");
    return r;
  };

  const run = createMiddlewareRunner([m1, m2], async () => {
    order.push("handler");
    return new Response("ok");
  });

  const res = await run(createTestContext());

  expect(order).toEqual([
    "m1-before",
    "m2-before",
    "handler",
    "m2-after",
    "m1-after",
  ]);
  expect(await res.text()).toBe("ok");
});

test("middleware runner - middleware can short-circuit by not calling next", async () => {
  let handlerCalled = false;

  const blocker: Middleware = async () => new Response("blocked", { status: 429 });
  const run = createMiddlewareRunner([blocker], async () => {
    handlerCalled = true;
    return new Response("handler");
  });

  const res = await run(createTestContext());

  expect(res.status).toBe(429);
  expect(await res.text()).toBe("blocked");
  expect(handlerCalled).toBe(false);
});

test("middleware runner - error in handler propagates through middlewares", async () => {
  const order: string[] = [];

  const wrapper: Middleware = async (_ctx, next) => {
    order.push("before");
    try {
      return await next();
    } finally {
      order.push("after");
    }
  };

  const run = createMiddlewareRunner([wrapper], async () => {
    throw new Error("handler error");
  });

  await expect(run(createTestContext())).rejects.toThrow("handler error");
  expect(order).toEqual(["before", "after"]);
});

test("middleware runner - context headers land on the handler response", async () => {
  const tagger: Middleware = async (ctx, next) => {
    ctx.responseHeaders.set("X-Request-Id", ctx.requestId);
    ctx.responseHeaders.append("Vary", "Origin");
    return next();
  };

  const run = createMiddlewareRunner([tagger], async () =>
    new Response("ok", { headers: { Vary: "Accept-Encoding" } }));

  const res = await run(createTestContext({ requestId: "req-42" }));

  expect(res.headers.get("X-Request-Id")).toBe("req-42");
  expect(res.headers.get("Vary")).toBe("Accept-Encoding, Origin");
});

test("middleware runner - context headers land on short-circuit responses", async () => {
  const tagger: Middleware = async (ctx, next) => {
    ctx.responseHeaders.append("Vary", "Authorization");
    return next();
  };
  const blocker: Middleware = async () => new Response(null, { status: 401 });

  const run = createMiddlewareRunner([tagger, blocker], ok);
  const res = await run(createTestContext());

  expect(res.status).toBe(401);
  expect(res.headers.get("Vary")).toBe("Authorization");
});

test("middleware runner - three middlewares compose correctly", async () => {
  const values: number[] = [];

  const m1: Middleware = async (_ctx, next) => {
    values.push(1);
    const r = await next();
    values.push(6);
    return r;
  };
  const m2: Middleware = async (_ctx, next) => {
    values.push(2);
    const r = await next();
    values.push(5);
    return r;
  };
  const m3: Middleware = async (_ctx, next) => {
    values.push(3);
    const r = await next();
    values.push(4);
    return r;
  };

  const run = createMiddlewareRunner([m1, m2, m3], ok);
  await run(createTestContext());

  expect(values).toEqual([1, 2, 3, 4, 5, 6]);
});

test("middleware runner - throws when next() called after handler completes (double-call guard)", async () => {
  const calls: Array<() => Promise<Response>> = [];

  const sneaky: Middleware = async (_ctx, next) => {
    calls.push(next);
    return next(); // first call - OK
  };

  const run = createMiddlewareRunner([sneaky], ok);
  await run(createTestContext());

  await expect(calls[0]()).rejects.toThrow(
    "[MiddlewareRunner] next() called after pipeline already completed.",
  );
});
