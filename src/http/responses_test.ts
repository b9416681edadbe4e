import { expect, test } from "vitest";
import { applyResponseHeaders, jsonResponse } from "./responses.ts";

test("jsonResponse - serializes with status and headers", async () => {
  const res = jsonResponse({ ok: true }, 201, { Location: "/v1/movies/1" });

  expect(res.status).toBe(201);
  expect(res.headers.get("Content-Type")).toBe("application/json");
  expect(res.headers.get("Location")).toBe("/v1/movies/1");
  expect(await res.text()).toBe('{"ok":true}');
});

test("applyResponseHeaders - adds missing headers", () => {
  const res = applyResponseHeaders(
    new Response("x", { status: 202 }),
    new Headers({ "X-Request-Id": "req-1" }),
  );

  expect(res.status).toBe(202);
  expect(res.headers.get("X-Request-Id")).toBe("req-1");
});

test("applyResponseHeaders - response headers win except Vary", () => {
  const res = applyResponseHeaders(
    new Response("x", {
      headers: { "X-Request-Id": "from-handler", Vary: "Accept-Encoding" },
    }),
    new Headers({ "X-Request-Id": "from-context", Vary: "Origin" }),
  );

  expect(res.headers.get("X-Request-Id")).toBe("from-handler");
  expect(res.headers.get("Vary")).toBe("Accept-Encoding, Origin");
});

test("applyResponseHeaders - Vary tokens are deduplicated case-insensitively", () => {
  const res = applyResponseHeaders(
    new Response(null, { headers: { Vary: "origin" } }),
    new Headers([["Vary", "Origin"], ["Vary", "Authorization"]]),
  );

  expect(res.headers.get("Vary")).toBe("origin, Authorization");
});

test("applyResponseHeaders - keeps the body", async () => {
  const res = applyResponseHeaders(
    new Response("payload"),
    new Headers(),
  );

  expect(await res.text()).toBe("payload");
});
