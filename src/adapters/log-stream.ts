import { Writable } from "node:stream";
import type { Logger } from "../core/logger.js";

/**
 * A `Writable` that feeds every chunk to {@link Logger.write}, for pointing
 * stream-based output (a `Console`, a legacy logger) at the JSON log. Each
 * chunk becomes one WARNING record.
 *
 * ```ts
 * const legacy = new Console({ stdout: createLogStream(logger) });
 * legacy.log("cache warmed"); // {"message":"cache warmed","log":{"level":"WARNING"},...}
 * ```
 */
export function createLogStream(logger: Pick<Logger, "write">): Writable {
  return new Writable({
    decodeStrings: false,
    write(chunk: string | Buffer, _encoding, callback) {
      logger.write(chunk);
      callback();
    },
  });
}
