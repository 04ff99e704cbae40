import { describe, expect, test } from "vitest";
import { Metrics, quantile } from "../app/metrics.ts";

describe("Metrics", () => {
  test("renders headers and a zero summary before any traffic", () => {
    expect(new Metrics().render()).toBe(
      [
        "# HELP http_requests_total Total HTTP requests by path and status",
        "# TYPE http_requests_total counter",
        "# HELP webhook_requests_total Total webhook requests by result",
        "# TYPE webhook_requests_total counter",
        "# HELP request_latency_ms Request latency in milliseconds",
        "# TYPE request_latency_ms summary",
        "request_latency_ms_sum 0",
        "request_latency_ms_count 0",
        "",
      ].join("\n")
    );
  });

  test("counts requests, outcomes and latency quantiles", () => {
    const metrics = new Metrics();
    metrics.recordHttpRequest("/webhook", 200);
    metrics.recordHttpRequest("/webhook", 401);
    metrics.recordHttpRequest("/webhook", 200);
    metrics.recordHttpRequest("/messages", 200);
    metrics.recordWebhookResult("duplicate");
    metrics.recordWebhookResult("created");
    metrics.recordWebhookResult("created");
    for (const ms of [7, 3, 10, 1, 5, 2, 9, 4, 8, 6]) {
      metrics.recordLatency(ms);
    }

    expect(metrics.render()).toBe(
      [
        "# HELP http_requests_total Total HTTP requests by path and status",
        "# TYPE http_requests_total counter",
        'http_requests_total{path="/messages",status="200"} 1',
        'http_requests_total{path="/webhook",status="200"} 2',
        'http_requests_total{path="/webhook",status="401"} 1',
        "# HELP webhook_requests_total Total webhook requests by result",
        "# TYPE webhook_requests_total counter",
        'webhook_requests_total{result="created"} 2',
        'webhook_requests_total{result="duplicate"} 1',
        "# HELP request_latency_ms Request latency in milliseconds",
        "# TYPE request_latency_ms summary",
        'request_latency_ms{quantile="0.5"} 6',
        'request_latency_ms{quantile="0.9"} 10',
        'request_latency_ms{quantile="0.99"} 10',
        "request_latency_ms_sum 55",
        "request_latency_ms_count 10",
        "",
      ].join("\n")
    );
  });

  test("escapes label values", () => {
    const metrics = new Metrics();
    metrics.recordHttpRequest('/a"b\\c', 404);
    expect(metrics.render()).toContain('http_requests_total{path="/a\\"b\\\\c",status="404"} 1\n');
  });
});

test("quantile uses nearest rank clamped to the last sample", () => {
  expect(quantile([42], 0.99)).toBe(42);
  expect(quantile([1, 2, 3, 4], 0.5)).toBe(3);
  expect(quantile([1, 2, 3, 4], 0.99)).toBe(4);
  expect(quantile([], 0.5)).toBe(0);
});
