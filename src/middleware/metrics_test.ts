import { expect, test } from "vitest";
import { ServerMetrics } from "../observability/metrics.ts";
import { createTestContext } from "../testing/helpers.ts";
import { createMetricsMiddleware } from "./metrics.ts";

test("metrics middleware - counts request and response by status", async () => {
  const metrics = new ServerMetrics();
  const middleware = createMetricsMiddleware(metrics);

  const res = await middleware(
    createTestContext(),
    async () => new Response(null, { status: 404 }),
  );

  expect(res.status).toBe(404);
  const snapshot = metrics.getSnapshot();
  expect(snapshot.counters.requests_received).toBe(1);
  expect(snapshot.counters.responses_sent).toBe(1);
  expect(snapshot.responses_sent_by_status).toEqual({ "404": 1 });
});

test("metrics middleware - counts the request before downstream runs", async () => {
  const metrics = new ServerMetrics();
  const middleware = createMetricsMiddleware(metrics);
  let seenDuringHandler = -1;

  await middleware(createTestContext(), async () => {
    seenDuringHandler = metrics.getSnapshot().counters.requests_received;
    return new Response("ok");
  });

  expect(seenDuringHandler).toBe(1);
});

test("metrics middleware - records duration from the injected clock", async () => {
  const metrics = new ServerMetrics();
  const ticks = [1000, 1030];
  const middleware = createMetricsMiddleware(metrics, () => ticks.shift() ?? 0);

  await middleware(createTestContext(), async () => new Response("ok"));

  const histogram = metrics.getSnapshot().histograms.request_duration_ms;
  expect(histogram.count).toBe(1);
  expect(histogram.sum).toBe(30);
});

test("metrics middleware - downstream throw is recorded as 500 and rethrown unchanged", async () => {
  const metrics = new ServerMetrics();
  const middleware = createMetricsMiddleware(metrics);
  const failure = new Error("downstream");

  await expect(
    middleware(createTestContext(), () => Promise.reject(failure)),
  ).rejects.toBe(failure);

  const snapshot = metrics.getSnapshot();
  expect(snapshot.counters.responses_sent).toBe(1);
  expect(snapshot.responses_sent_by_status).toEqual({ "500": 1 });
});
