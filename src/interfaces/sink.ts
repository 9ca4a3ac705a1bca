/**
 * Destination for finished log lines.
 *
 * `process.stdout`, `fs.WriteStream` and any `Writable` satisfy it. A sink
 * shared across concurrent callers must accept whole-line writes without
 * splitting them; the logger does not serialise access to it.
 */
export interface Sink {
  write(chunk: string): unknown;
}
