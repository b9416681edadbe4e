import { expect, test } from "vitest";
import { ServerMetrics } from "./metrics.ts";

test("ServerMetrics - counters start at zero", () => {
  const snapshot = new ServerMetrics(() => 0).getSnapshot();

  expect(snapshot.counters).toEqual({
    requests_received: 0,
    responses_sent: 0,
    requests_rate_limited: 0,
    auth_success: 0,
    auth_failed: 0,
    panics_recovered: 0,
  });
  expect(snapshot.responses_sent_by_status).toEqual({});
});

test("ServerMetrics - histogram buckets are cumulative", () => {
  const metrics = new ServerMetrics(() => 0);

  metrics.recordResponseSent(200, 7);
  metrics.recordResponseSent(200, 30);
  metrics.recordResponseSent(500, 20000);

  const h = metrics.getSnapshot().histograms.request_duration_ms;
  const bucket = (le: number) => h.buckets.find((b) => b.le === le)?.count;
  expect(bucket(5)).toBe(0);
  expect(bucket(10)).toBe(1);
  expect(bucket(50)).toBe(2);
  expect(bucket(10000)).toBe(2);
  expect(h.count).toBe(3);
  expect(h.sum).toBe(20037);
});

test("ServerMetrics - status counts and auth outcomes", () => {
  const metrics = new ServerMetrics(() => 0);

  metrics.recordResponseSent(200, 1);
  metrics.recordResponseSent(429, 1);
  metrics.recordResponseSent(200, 1);
  metrics.recordAuth(true);
  metrics.recordAuth(false);
  metrics.recordAuth(false);

  const snapshot = metrics.getSnapshot();
  expect(snapshot.responses_sent_by_status).toEqual({ "200": 2, "429": 1 });
  expect(snapshot.counters.auth_success).toBe(1);
  expect(snapshot.counters.auth_failed).toBe(2);
});

test("ServerMetrics - uptime from the injected clock", () => {
  let now = 1_000;
  const metrics = new ServerMetrics(() => now);
  now = 62_500;

  const snapshot = metrics.getSnapshot();
  expect(snapshot.uptime_seconds).toBe(61);
  expect(snapshot.collected_at).toBe(62_500);
});

test("ServerMetrics - snapshot buckets are copies", () => {
  const metrics = new ServerMetrics(() => 0);
  const snapshot = metrics.getSnapshot();

  snapshot.histograms.request_duration_ms.buckets[0].count = 99;

  expect(metrics.getSnapshot().histograms.request_duration_ms.buckets[0].count)
    .toBe(0);
});

test("ServerMetrics - Prometheus export", () => {
  const metrics = new ServerMetrics(() => 0);
  metrics.recordRequestReceived();
  metrics.recordResponseSent(404, 3);
  metrics.recordRateLimited();
  metrics.setGauges({ rateLimiterKeys: 4 });

  const lines = metrics.toPrometheusFormat().split("\n");

  expect(lines).toContain("# TYPE marquee_requests_received_total counter");
  expect(lines).toContain("marquee_requests_received_total 1");
  expect(lines).toContain("marquee_requests_rate_limited_total 1");
  expect(lines).toContain('marquee_responses_sent_by_status{status="404"} 1');
  expect(lines).toContain('marquee_request_duration_ms_bucket{le="5"} 1');
  expect(lines).toContain('marquee_request_duration_ms_bucket{le="+Inf"} 1');
  expect(lines).toContain("marquee_request_duration_ms_sum 3");
  expect(lines).toContain("marquee_rate_limiter_keys 4");
  expect(lines).toContain("marquee_uptime_seconds 0");
});

test("ServerMetrics - custom Prometheus prefix", () => {
  const metrics = new ServerMetrics(() => 0);

  expect(metrics.toPrometheusFormat("api")).toContain(
    "\napi_panics_recovered_total 0\n",
  );
});

test("ServerMetrics - reset clears counters", () => {
  const metrics = new ServerMetrics(() => 0);
  metrics.recordRequestReceived();
  metrics.recordPanic();
  metrics.recordResponseSent(500, 10);

  metrics.reset();

  const snapshot = metrics.getSnapshot();
  expect(snapshot.counters.requests_received).toBe(0);
  expect(snapshot.counters.panics_recovered).toBe(0);
  expect(snapshot.responses_sent_by_status).toEqual({});
  expect(snapshot.histograms.request_duration_ms.count).toBe(0);
});
