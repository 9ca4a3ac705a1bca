import { describe, expect, it } from "vitest";
import {
  AddressParseError,
  ConfigError,
  errorMessage,
  InvalidLevelError,
  LoggingError,
} from "./errors.js";

describe("LoggingError hierarchy", () => {
  it("LoggingError is an Error with code", () => {
    const err = new LoggingError("test", "TEST_ERROR");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("LoggingError");
    expect(err.code).toBe("TEST_ERROR");
    expect(err.message).toBe("test");
  });

  it("domain errors have correct codes and extend LoggingError", () => {
    const level = new InvalidLevelError(99);
    expect(level).toBeInstanceOf(LoggingError);
    expect(level.code).toBe("INVALID_LEVEL");
    expect(level.name).toBe("InvalidLevelError");
    expect(level.message).toBe("Unsupported log level: 99");
    expect(level.level).toBe(99);

    const address = new AddressParseError("nope", "missing port in address");
    expect(address).toBeInstanceOf(LoggingError);
    expect(address.code).toBe("ADDRESS_PARSE");
    expect(address.message).toBe("address nope: missing port in address");
    expect(address.address).toBe("nope");

    expect(new ConfigError("x").code).toBe("CONFIG");
  });

  it("preserves cause chain", () => {
    const cause = new Error("original");
    const err = new ConfigError("bad env", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("errorMessage", () => {
  it("extracts message from Error instances", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(new LoggingError("typed", "T"))).toBe("typed");
  });

  it("stringifies non-Error values", () => {
    expect(errorMessage("string error")).toBe("string error");
    expect(errorMessage(42)).toBe("42");
    expect(errorMessage(null)).toBe("Unknown error");
    expect(errorMessage(undefined)).toBe("Unknown error");
  });
});
