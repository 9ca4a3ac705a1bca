/**
 * Leveled logging surface shared by the core logger and request-scoped views.
 * Adapters and middleware program to this interface.
 * @module
 */

import type { Level } from "../core/level.js";

/** printf-style leveled logger. Arguments are only formatted for records that pass the level filter. */
export interface LevelLogger {
  debug(template: string, ...args: unknown[]): void;
  info(template: string, ...args: unknown[]): void;
  warning(template: string, ...args: unknown[]): void;
  error(template: string, ...args: unknown[]): void;
  fatal(template: string, ...args: unknown[]): void;
  log(level: Level, template: string, ...args: unknown[]): void;
}
