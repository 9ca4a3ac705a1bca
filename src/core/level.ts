/**
 * Severity levels, ordered from least to most severe.
 * Filtering compares the numeric rank: a record is emitted when
 * `level >= minimumLevel`.
 */
export enum Level {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
  FATAL = 4,
}

export type LevelName = "DEBUG" | "INFO" | "WARNING" | "ERROR" | "FATAL";

const LEVEL_NAMES: Record<Level, LevelName> = {
  [Level.DEBUG]: "DEBUG",
  [Level.INFO]: "INFO",
  [Level.WARNING]: "WARNING",
  [Level.ERROR]: "ERROR",
  [Level.FATAL]: "FATAL",
};

export const LEVELS: readonly Level[] = [
  Level.DEBUG,
  Level.INFO,
  Level.WARNING,
  Level.ERROR,
  Level.FATAL,
];

const LEVELS_BY_NAME = new Map<string, Level>(LEVELS.map((level) => [LEVEL_NAMES[level], level]));

export function validLevel(level: unknown): level is Level {
  return typeof level === "number" && Object.hasOwn(LEVEL_NAMES, level);
}

/** Canonical uppercase name of a level, or "" for anything else. */
export function levelString(level: unknown): LevelName | "" {
  return validLevel(level) ? LEVEL_NAMES[level] : "";
}

/**
 * Resolve a level given either as a `Level` value or as a name
 * (case-insensitive, e.g. "debug"). Returns undefined when unrecognised.
 */
export function parseLevel(level: unknown): Level | undefined {
  if (validLevel(level)) return level;
  if (typeof level !== "string") return undefined;
  return LEVELS_BY_NAME.get(level.trim().toUpperCase());
}
