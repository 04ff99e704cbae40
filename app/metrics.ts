type Counter = Map<string, number>;

const QUANTILES = [0.5, 0.9, 0.99] as const;

function increment(counter: Counter, key: string): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/** Nearest-rank quantile over an ascending sample list. */
export function quantile(sorted: readonly number[], q: number): number {
  const index = Math.min(Math.floor(sorted.length * q), sorted.length - 1);
  return sorted[index] ?? 0;
}

/**
 * Process-wide request metrics. Construct once at startup and hand the
 * instance to everything that records; latency samples are kept for the
 * life of the process so quantiles cover every observation.
 */
export class Metrics {
  private readonly httpRequests = new Map<string, { path: string; status: number; count: number }>();
  private readonly webhookResults: Counter = new Map();
  private readonly latencies: number[] = [];
  private latencyTotal = 0;

  recordHttpRequest(path: string, status: number): void {
    const key = `${path}|${status}`;
    const entry = this.httpRequests.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      this.httpRequests.set(key, { path, status, count: 1 });
    }
  }

  recordWebhookResult(result: string): void {
    increment(this.webhookResults, result);
  }

  recordLatency(ms: number): void {
    this.latencies.push(ms);
    this.latencyTotal += ms;
  }

  render(): string {
    const lines: string[] = [];

    lines.push("# HELP http_requests_total Total HTTP requests by path and status");
    lines.push("# TYPE http_requests_total counter");
    const requests = [...this.httpRequests.values()].sort((a, b) =>
      a.path === b.path ? a.status - b.status : a.path < b.path ? -1 : 1
    );
    for (const { path, status, count } of requests) {
      lines.push(`http_requests_total{path="${escapeLabel(path)}",status="${status}"} ${count}`);
    }

    lines.push("# HELP webhook_requests_total Total webhook requests by result");
    lines.push("# TYPE webhook_requests_total counter");
    const results = [...this.webhookResults.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [result, count] of results) {
      lines.push(`webhook_requests_total{result="${escapeLabel(result)}"} ${count}`);
    }

    lines.push("# HELP request_latency_ms Request latency in milliseconds");
    lines.push("# TYPE request_latency_ms summary");
    if (this.latencies.length > 0) {
      const sorted = [...this.latencies].sort((a, b) => a - b);
      for (const q of QUANTILES) {
        lines.push(`request_latency_ms{quantile="${q}"} ${quantile(sorted, q)}`);
      }
    }
    lines.push(`request_latency_ms_sum ${this.latencyTotal}`);
    lines.push(`request_latency_ms_count ${this.latencies.length}`);

    return lines.join("\n") + "\n";
  }
}
