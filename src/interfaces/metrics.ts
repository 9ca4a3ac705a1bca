/**
 * Metric handles consumed by the request-instrumentation middleware.
 * `prom-client` `Counter<"code" | "method">` and `Histogram<"code" | "method">`
 * satisfy these structurally.
 */

export interface RequestLabels {
  code: string;
  method: string;
}

export interface RequestCounter {
  inc(labels: RequestLabels, value?: number): void;
}

export interface DurationHistogram {
  /** Record one duration, in seconds. */
  observe(labels: RequestLabels, value: number): void;
}
