import type { LevelLogger } from "../interfaces/logger.js";
import { formatMessage } from "./format.js";
import { Level } from "./level.js";
import type { RequestFields } from "./log-record.js";
import type { Logger } from "./logger.js";

/**
 * A view of a {@link Logger} bound to one unit of work (usually one inbound
 * request). Records it writes carry the client, network and trace blocks
 * captured when the scope was created; filtering and output are the
 * parent's.
 */
export class ScopedLogger implements LevelLogger {
  readonly parent: Logger;
  readonly fields: RequestFields;

  constructor(parent: Logger, fields: RequestFields) {
    this.parent = parent;
    this.fields = fields;
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
    this.parent.emit(level, (effective) =>
      this.parent.record(effective, formatMessage(template, args), this.fields),
    );
  }
}
