import { describe, expect, it } from "vitest";
import { Level } from "../core/level.js";
import { createLogger } from "../core/logger.js";
import { MemorySink } from "../testing/memory-sink.js";
import { LoggingConnectObserver } from "./logging-connect-observer.js";

function setUp(minimumLevel: Level = Level.DEBUG) {
  const sink = new MemorySink();
  const logger = createLogger({ sink, serviceName: "store", minimumLevel });
  return { sink, logger };
}

describe("LoggingConnectObserver", () => {
  it("logs failed connections at ERROR", () => {
    const { sink, logger } = setUp();
    const observer = new LoggingConnectObserver(logger);

    observer.observeConnect({ address: "10.0.0.5:9042", error: new Error("connection refused") });

    const record = sink.only();
    expect(record.log.level).toBe("ERROR");
    expect(record.message).toBe(
      "Cassandra: Problem connecting to 10.0.0.5:9042, (connection refused)",
    );
  });

  it("logs new connections at DEBUG", () => {
    const { sink, logger } = setUp();
    const observer = new LoggingConnectObserver(logger);

    observer.observeConnect({ address: "10.0.0.5:9042" });

    const record = sink.only();
    expect(record.log.level).toBe("DEBUG");
    expect(record.message).toBe("Cassandra: Opened new connection to 10.0.0.5:9042");
  });

  it("renders non-Error failures as text", () => {
    const { sink, logger } = setUp();

    new LoggingConnectObserver(logger).observeConnect({ address: "db:5432", error: "timeout" });

    expect(sink.only().message).toBe("Cassandra: Problem connecting to db:5432, (timeout)");
  });

  it("uses a custom label", () => {
    const { sink, logger } = setUp();

    new LoggingConnectObserver(logger, { label: "Postgres" }).observeConnect({ address: "db:5432" });

    expect(sink.only().message).toBe("Postgres: Opened new connection to db:5432");
  });

  it("leaves filtering to the logger", () => {
    const { sink, logger } = setUp(Level.INFO);
    const observer = new LoggingConnectObserver(logger);

    observer.observeConnect({ address: "db:5432" });
    observer.observeConnect({ address: "db:5432", error: new Error("down") });

    expect(sink.records().map((r) => r.log.level)).toEqual(["ERROR"]);
  });
});
