import type { IncomingMessage, ServerResponse } from "node:http";
import { errorMessage } from "../errors.js";

export interface MetricsSource {
  getMetricsOutput(): Promise<string>;
}

export async function handleMetrics(
  _req: IncomingMessage,
  res: ServerResponse,
  metrics: MetricsSource,
): Promise<void> {
  let output: string;
  try {
    output = await metrics.getMetricsOutput();
  } catch (err) {
    res.writeHead(500, { "Content-Type": "text/plain; charset=utf-8" });
    res.end(`failed to collect metrics: ${errorMessage(err)}`);
    return;
  }
  res.writeHead(200, {
    "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
  });
  res.end(output);
}
