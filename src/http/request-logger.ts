import { AsyncLocalStorage } from "node:async_hooks";
import type { IncomingMessage } from "node:http";
import type { Logger } from "../core/logger.js";
import type { ScopedLogger } from "../core/scoped-logger.js";
import type { Middleware } from "./types.js";

const storage = new AsyncLocalStorage<ScopedLogger>();
const byRequest = new WeakMap<IncomingMessage, ScopedLogger>();

/**
 * Derive a {@link ScopedLogger} for each request and expose it to the
 * handler, and to everything the handler awaits, via {@link requestLogger}.
 */
export function withRequestLogger(logger: Logger): Middleware {
  return (next) => (req, res) => {
    const scoped = logger.forRequest(req);
    byRequest.set(req, scoped);
    storage.run(scoped, () => next(req, res));
  };
}

/** Scoped logger of the request being handled in the current async context. */
export function requestLogger(): ScopedLogger | undefined {
  return storage.getStore();
}

export function requestLoggerFor(req: IncomingMessage): ScopedLogger | undefined {
  return byRequest.get(req);
}
