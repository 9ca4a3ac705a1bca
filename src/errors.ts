export class LoggingError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LoggingError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Raised when a logger is configured with a level outside DEBUG..FATAL. */
export class InvalidLevelError extends LoggingError {
  readonly level: unknown;

  constructor(level: unknown, options?: ErrorOptions) {
    super(`Unsupported log level: ${String(level)}`, "INVALID_LEVEL", options);
    this.name = "InvalidLevelError";
    this.level = level;
  }
}

export class AddressParseError extends LoggingError {
  readonly address: string;

  constructor(address: string, reason: string, options?: ErrorOptions) {
    super(`address ${address}: ${reason}`, "ADDRESS_PARSE", options);
    this.name = "AddressParseError";
    this.address = address;
  }
}

export class ConfigError extends LoggingError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
