import type { DurationHistogram, RequestCounter, RequestLabels } from "../interfaces/metrics.js";
import type { Middleware } from "./types.js";

/**
 * Count and time every request, labelled by response status code and HTTP
 * method. Observations are made once, when the response finishes or the
 * connection closes, whichever comes first. A status never set explicitly
 * is reported as 200.
 */
export function instrumentRequests(
  requestCounter: RequestCounter,
  durationHistogram: DurationHistogram,
): Middleware {
  return (next) => (req, res) => {
    const start = performance.now();
    let reported = false;

    const report = (): void => {
      if (reported) return;
      reported = true;
      const labels: RequestLabels = {
        code: String(res.statusCode || 200),
        method: req.method ?? "",
      };
      durationHistogram.observe(labels, (performance.now() - start) / 1000);
      requestCounter.inc(labels);
    };

    res.once("finish", report);
    res.once("close", report);

    next(req, res);
  };
}
