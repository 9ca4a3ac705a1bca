import type { IncomingMessage, ServerResponse } from "node:http";

/** A `node:http` request listener. */
export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => void;

/** Wraps a handler with behaviour that runs around every request. */
export type Middleware = (next: RequestHandler) => RequestHandler;
