import type { Counter, Histogram, Registry } from "prom-client";
import { instrumentRequests } from "../http/instrumentation.js";
import type { RequestHandler } from "../http/types.js";

type PromClient = typeof import("prom-client");
type RequestLabelName = "code" | "method";

export const DEFAULT_DURATION_BUCKETS: readonly number[] = [
  0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1,
];

export interface PrometheusHttpMetricsOptions {
  /** Prepended to metric names. Defaults to "". */
  prefix?: string;
  buckets?: readonly number[];
  defaultLabels?: Record<string, string>;
}

/**
 * HTTP request counter and latency histogram on a private registry.
 * Requires prom-client to be passed in at construction time.
 */
export class PrometheusHttpMetrics {
  readonly registry: Registry;
  readonly requestsTotal: Counter<RequestLabelName>;
  readonly requestDuration: Histogram<RequestLabelName>;

  constructor(promClient: PromClient, options: PrometheusHttpMetricsOptions = {}) {
    const prefix = options.prefix ?? "";
    this.registry = new promClient.Registry();

    if (options.defaultLabels) {
      this.registry.setDefaultLabels(options.defaultLabels);
    }

    this.requestsTotal = new promClient.Counter({
      name: `${prefix}http_requests_total`,
      help: "Count of HTTP requests processed, partitioned by status code and HTTP method.",
      labelNames: ["code", "method"],
      registers: [this.registry],
    });

    this.requestDuration = new promClient.Histogram({
      name: `${prefix}http_request_duration_seconds`,
      help: "A histogram of latencies for requests, partitioned by status code and HTTP method.",
      labelNames: ["code", "method"],
      buckets: [...(options.buckets ?? DEFAULT_DURATION_BUCKETS)],
      registers: [this.registry],
    });
  }

  /** Wrap a handler so each request it serves is counted and timed. */
  instrument(handler: RequestHandler): RequestHandler {
    return instrumentRequests(this.requestsTotal, this.requestDuration)(handler);
  }

  async getMetricsOutput(): Promise<string> {
    return this.registry.metrics();
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
