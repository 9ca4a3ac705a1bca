import { errorMessage, InvalidLevelError } from "../errors.js";
import type { LevelLogger } from "../interfaces/logger.js";
import type { Sink } from "../interfaces/sink.js";
import { formatMessage } from "./format.js";
import { Level, type LevelName, parseLevel, validLevel } from "./level.js";
import {
  buildRecord,
  type EcsService,
  type LogRecord,
  type RecordSupplier,
  type RequestFields,
} from "./log-record.js";
import { type InboundRequest, extractRequestFields } from "./request-fields.js";
import { ScopedLogger } from "./scoped-logger.js";

export interface LoggerOptions {
  /** Where finished lines go. Defaults to `process.stdout`. */
  sink?: Sink;
  /** ECS `service.name`. */
  serviceName: string;
  /** ECS `service.type`; omitted from records when unset. */
  serviceType?: string;
  /** Records below this level are dropped before formatting. Defaults to INFO. */
  minimumLevel?: Level | LevelName | Lowercase<LevelName>;
}

/**
 * Leveled ECS JSON logger. Build one at startup with {@link createLogger}
 * and share it; derive a {@link ScopedLogger} per request with
 * {@link Logger.forRequest}.
 *
 * Immutable once constructed. Each call writes exactly one line.
 */
export class Logger implements LevelLogger {
  readonly serviceName: string;
  readonly serviceType: string | undefined;
  readonly minimumLevel: Level;
  private readonly sink: Sink;
  private readonly service: Readonly<EcsService>;

  constructor(sink: Sink, service: EcsService, minimumLevel: Level) {
    if (!validLevel(minimumLevel)) throw new InvalidLevelError(minimumLevel);
    this.sink = sink;
    this.serviceName = service.name;
    this.serviceType = service.type;
    this.minimumLevel = minimumLevel;
    this.service = Object.freeze({ ...service });
  }

  debug(template: string, ...args: unknown[]): void {
    this.log(Level.DEBUG, template, ...args);
  }

  info(template: string, ...args: unknown[]): void {
    this.log(Level.INFO, template, ...args);
  }

  warning(template: string, ...args: unknown[]): void {
    this.log(Level.WARNING, template, ...args);
  }

  error(template: string, ...args: unknown[]): void {
    this.log(Level.ERROR, template, ...args);
  }

  fatal(template: string, ...args: unknown[]): void {
    this.log(Level.FATAL, template, ...args);
  }

  log(level: Level, template: string, ...args: unknown[]): void {
    this.emit(level, (effective) => this.record(effective, formatMessage(template, args)));
  }

  /**
   * Byte-sink entry point, for redirecting legacy output into this logger.
   * The chunk becomes one WARNING record with a single trailing newline
   * removed. Always reports the whole chunk as consumed.
   */
  write(chunk: string | Uint8Array): number {
    const text = typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8");
    const message = text.endsWith("\n") ? text.slice(0, -1) : text;
    this.emit(Level.WARNING, (level) => this.record(level, message));
    return typeof chunk === "string" ? Buffer.byteLength(chunk, "utf8") : chunk.byteLength;
  }

  /** Derive a logger bound to one inbound request. */
  forRequest(request: InboundRequest): ScopedLogger {
    const { fields, addressError } = extractRequestFields(request);
    if (addressError) {
      this.error("Unable to parse %s as IP:port", JSON.stringify(addressError.address));
    }
    return new ScopedLogger(this, fields);
  }

  /** Build a record carrying this logger's service identity. */
  record(level: Level, message: string, fields?: RequestFields): LogRecord {
    return buildRecord({ level, message, service: this.service, fields });
  }

  /**
   * Filter, materialise and write one record. `supplier` is invoked only when
   * the level passes the filter. Out-of-range levels are reported once at
   * ERROR and then treated as ERROR.
   */
  emit(level: Level, supplier: RecordSupplier): void {
    if (!validLevel(level)) {
      this.error("Invalid log level specified (%s); This is a bug!", String(level));
      level = Level.ERROR;
    }

    if (level < this.minimumLevel) return;

    const record = supplier(level);

    let line: string;
    try {
      line = JSON.stringify(record);
    } catch (err) {
      line = this.serializationFallback(record, err);
    }

    this.send(line);
  }

  private serializationFallback(record: LogRecord, err: unknown): string {
    const detail = `Error serializing log message: ${errorMessage(err)} (${String(record.message)})`;
    return `{"@timestamp":${JSON.stringify(record["@timestamp"])},"message":${JSON.stringify(detail)},"log":{"level":"ERROR"},"service":{"name":${JSON.stringify(this.serviceName)}}}`;
  }

  private send(line: string): void {
    // Write errors belong to the sink's owner; nothing sensible to do here.
    this.sink.write(`${line}\n`);
  }
}

/**
 * Construct a logger. Throws {@link InvalidLevelError} if `minimumLevel`
 * is not one of DEBUG, INFO, WARNING, ERROR, FATAL (as a value or name).
 */
export function createLogger(options: LoggerOptions): Logger {
  const requested = options.minimumLevel ?? Level.INFO;
  const minimumLevel = parseLevel(requested);
  if (minimumLevel === undefined) throw new InvalidLevelError(requested);

  const service: EcsService = { name: options.serviceName };
  if (options.serviceType) service.type = options.serviceType;

  return new Logger(options.sink ?? process.stdout, service, minimumLevel);
}
