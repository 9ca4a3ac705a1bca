import { EventEmitter } from "node:events";
import type { IncomingMessage, ServerResponse } from "node:http";
import * as promClient from "prom-client";
import { describe, expect, it } from "vitest";
import { DEFAULT_DURATION_BUCKETS, PrometheusHttpMetrics } from "./prometheus-http-metrics.js";

/** Run one request through an instrumented handler and finish it. */
function serve(metrics: PrometheusHttpMetrics, method: string, status: number): void {
  const req = { method } as unknown as IncomingMessage;
  const emitter = Object.assign(new EventEmitter(), { statusCode: 200 });
  const handler = metrics.instrument((_req, res) => {
    res.statusCode = status;
  });
  handler(req, emitter as unknown as ServerResponse);
  emitter.emit("finish");
}

describe("PrometheusHttpMetrics", () => {
  it("counts and times requests by status code and method", async () => {
    const metrics = new PrometheusHttpMetrics(promClient);

    serve(metrics, "GET", 200);

    const output = await metrics.getMetricsOutput();
    expect(output).toContain('http_requests_total{code="200",method="GET"} 1');
    expect(output).toContain('http_request_duration_seconds_count{code="200",method="GET"} 1');
  });

  it("keeps separate series per label pair", async () => {
    const metrics = new PrometheusHttpMetrics(promClient);

    serve(metrics, "GET", 200);
    serve(metrics, "GET", 200);
    serve(metrics, "POST", 201);

    const { values } = await metrics.requestsTotal.get();
    const byLabels = values.map((v) => [v.labels.code, v.labels.method, v.value]);
    expect(byLabels).toEqual([
      ["200", "GET", 2],
      ["201", "POST", 1],
    ]);
  });

  it("uses a private registry per instance", async () => {
    const first = new PrometheusHttpMetrics(promClient);
    const second = new PrometheusHttpMetrics(promClient);

    serve(first, "GET", 200);

    expect(await second.getMetricsOutput()).not.toContain('http_requests_total{code="200"');
  });

  it("applies the name prefix", async () => {
    const metrics = new PrometheusHttpMetrics(promClient, { prefix: "orders_" });

    expect(await metrics.getMetricsOutput()).toContain("# TYPE orders_http_requests_total counter");
  });

  it("applies default labels", async () => {
    const metrics = new PrometheusHttpMetrics(promClient, { defaultLabels: { service: "orders" } });

    serve(metrics, "GET", 200);

    const counterLine = (await metrics.getMetricsOutput())
      .split("\n")
      .find((line) => line.startsWith("http_requests_total{"));
    expect(counterLine).toContain('service="orders"');
  });

  it("uses the default latency buckets", async () => {
    const metrics = new PrometheusHttpMetrics(promClient);

    serve(metrics, "GET", 200);

    const bounds = (await metrics.getMetricsOutput())
      .split("\n")
      .filter((line) => line.startsWith("http_request_duration_seconds_bucket{"))
      .map((line) => /le="([^"]+)"/.exec(line)?.[1]);
    expect(bounds).toEqual([...DEFAULT_DURATION_BUCKETS.map(String), "+Inf"]);
  });

  it("reset clears recorded series", async () => {
    const metrics = new PrometheusHttpMetrics(promClient);
    serve(metrics, "GET", 200);

    metrics.reset();

    expect((await metrics.requestsTotal.get()).values).toEqual([]);
  });
});
