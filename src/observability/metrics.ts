/**
 * Server Metrics Collector
 *
 * In-memory counters, a latency histogram and gauges, exported as
 * Prometheus text and as a JSON snapshot. Owned by ApiServer and shared by
 * every request; each update is a plain synchronous increment.
 *
 * @module marquee/observability/metrics
 */

/**
 * Histogram bucket
 */
interface HistogramBucket {
  le: number;
  count: number;
}

/**
 * Latency histogram with cumulative buckets
 */
interface Histogram {
  buckets: HistogramBucket[];
  sum: number;
  count: number;
}

/**
 * Default histogram buckets (milliseconds)
 */
const DEFAULT_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

function createHistogram(buckets: number[] = DEFAULT_BUCKETS): Histogram {
  return {
    buckets: buckets.map((le) => ({ le, count: 0 })),
    sum: 0,
    count: 0,
  };
}

function observeHistogram(histogram: Histogram, value: number): void {
  histogram.sum += value;
  histogram.count++;
  for (const bucket of histogram.buckets) {
    if (value <= bucket.le) {
      bucket.count++;
    }
  }
}

/**
 * Metrics snapshot returned by getSnapshot()
 */
export interface ServerMetricsSnapshot {
  counters: {
    requests_received: number;
    responses_sent: number;
    requests_rate_limited: number;
    auth_success: number;
    auth_failed: number;
    panics_recovered: number;
  };
  /** Responses sent, keyed by three-digit status text */
  responses_sent_by_status: Record<string, number>;
  histograms: {
    request_duration_ms: Histogram;
  };
  gauges: {
    rate_limiter_keys: number;
  };
  collected_at: number;
  uptime_seconds: number;
}

/**
 * Server metrics collector.
 *
 * @example
 * ```typescript
 * const metrics = new ServerMetrics();
 * metrics.recordRequestReceived();
 * metrics.recordResponseSent(200, 12);
 * console.log(metrics.toPrometheusFormat());
 * ```
 */
export class ServerMetrics {
  private startTime: number;

  // Counters
  private requestsReceived = 0;
  private responsesSent = 0;
  private requestsRateLimited = 0;
  private authSuccess = 0;
  private authFailed = 0;
  private panicsRecovered = 0;
  private byStatus = new Map<string, number>();

  // Histogram
  private requestDuration = createHistogram();

  // Gauges (set externally via setGauges)
  private rateLimiterKeys = 0;

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  recordRequestReceived(): void {
    this.requestsReceived++;
  }

  /**
   * Record a response leaving the pipeline
   */
  recordResponseSent(status: number, durationMs: number): void {
    this.responsesSent++;
    const key = String(status);
    this.byStatus.set(key, (this.byStatus.get(key) ?? 0) + 1);
    observeHistogram(this.requestDuration, durationMs);
  }

  recordRateLimited(): void {
    this.requestsRateLimited++;
  }

  recordAuth(success: boolean): void {
    if (success) this.authSuccess++;
    else this.authFailed++;
  }

  recordPanic(): void {
    this.panicsRecovered++;
  }

  /**
   * Update gauge values (called on-demand before export)
   */
  setGauges(gauges: { rateLimiterKeys?: number }): void {
    if (gauges.rateLimiterKeys !== undefined) {
      this.rateLimiterKeys = gauges.rateLimiterKeys;
    }
  }

  /**
   * Get current metrics snapshot
   */
  getSnapshot(): ServerMetricsSnapshot {
    const now = this.now();
    return {
      counters: {
        requests_received: this.requestsReceived,
        responses_sent: this.responsesSent,
        requests_rate_limited: this.requestsRateLimited,
        auth_success: this.authSuccess,
        auth_failed: this.authFailed,
        panics_recovered: this.panicsRecovered,
      },
      responses_sent_by_status: Object.fromEntries(this.byStatus),
      histograms: {
        request_duration_ms: {
          buckets: this.requestDuration.buckets.map((b) => ({ ...b })),
          sum: this.requestDuration.sum,
          count: this.requestDuration.count,
        },
      },
      gauges: {
        rate_limiter_keys: this.rateLimiterKeys,
      },
      collected_at: now,
      uptime_seconds: Math.floor((now - this.startTime) / 1000),
    };
  }

  /**
   * Prometheus text format export
   */
  toPrometheusFormat(prefix = "marquee"): string {
    const m = this.getSnapshot();
    const lines: string[] = [];

    // --- Counters ---
    const counter = (name: string, help: string, value: number) => {
      lines.push(`# HELP ${prefix}_${name} ${help}`);
      lines.push(`# TYPE ${prefix}_${name} counter`);
      lines.push(`${prefix}_${name} ${value}`);
    };

    counter(
      "requests_received_total",
      "Requests received",
      m.counters.requests_received,
    );
    counter(
      "responses_sent_total",
      "Responses sent",
      m.counters.responses_sent,
    );
    counter(
      "requests_rate_limited_total",
      "Requests rejected by rate limiter",
      m.counters.requests_rate_limited,
    );
    counter(
      "auth_success_total",
      "Successful bearer token verifications",
      m.counters.auth_success,
    );
    counter(
      "auth_failed_total",
      "Rejected bearer tokens",
      m.counters.auth_failed,
    );
    counter(
      "panics_recovered_total",
      "Unhandled failures contained by the recover layer",
      m.counters.panics_recovered,
    );

    // --- Per-status counters ---
    lines.push(
      `# HELP ${prefix}_responses_sent_by_status Responses sent by status code`,
    );
    lines.push(`# TYPE ${prefix}_responses_sent_by_status counter`);
    for (const [status, count] of Object.entries(m.responses_sent_by_status)) {
      lines.push(
        `${prefix}_responses_sent_by_status{status="${status}"} ${count}`,
      );
    }

    // --- Histogram ---
    const h = m.histograms.request_duration_ms;
    lines.push(
      `# HELP ${prefix}_request_duration_ms Request processing time in milliseconds`,
    );
    lines.push(`# TYPE ${prefix}_request_duration_ms histogram`);
    for (const bucket of h.buckets) {
      lines.push(
        `${prefix}_request_duration_ms_bucket{le="${bucket.le}"} ${bucket.count}`,
      );
    }
    lines.push(`${prefix}_request_duration_ms_bucket{le="+Inf"} ${h.count}`);
    lines.push(`${prefix}_request_duration_ms_sum ${h.sum}`);
    lines.push(`${prefix}_request_duration_ms_count ${h.count}`);

    // --- Gauges ---
    const gauge = (name: string, help: string, value: number) => {
      lines.push(`# HELP ${prefix}_${name} ${help}`);
      lines.push(`# TYPE ${prefix}_${name} gauge`);
      lines.push(`${prefix}_${name} ${value}`);
    };

    gauge(
      "rate_limiter_keys",
      "Clients tracked by the rate limiter",
      m.gauges.rate_limiter_keys,
    );
    gauge("uptime_seconds", "Server uptime in seconds", m.uptime_seconds);

    return lines.join("\n") + "\n";
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.requestsReceived = 0;
    this.responsesSent = 0;
    this.requestsRateLimited = 0;
    this.authSuccess = 0;
    this.authFailed = 0;
    this.panicsRecovered = 0;
    this.byStatus.clear();
    this.requestDuration = createHistogram();
    this.rateLimiterKeys = 0;
    this.startTime = this.now();
  }
}
