/**
 * Reports database connection events through a leveled logger: failures at
 * ERROR, new connections at DEBUG. Retry and reconnection stay with the
 * driver.
 *
 * ```ts
 * const observer = new LoggingConnectObserver(logger);
 * client.on("hostUp", (host) => observer.observeConnect({ address: host.address }));
 * ```
 */

import { errorMessage } from "../errors.js";
import type { ConnectObserver, ObservedConnect } from "../interfaces/connect-observer.js";
import type { LevelLogger } from "../interfaces/logger.js";

export interface LoggingConnectObserverOptions {
  /** Prefix naming the backend in each message. Defaults to "Cassandra". */
  label?: string;
}

export class LoggingConnectObserver implements ConnectObserver {
  private readonly logger: LevelLogger;
  private readonly label: string;

  constructor(logger: LevelLogger, options: LoggingConnectObserverOptions = {}) {
    this.logger = logger;
    this.label = options.label ?? "Cassandra";
  }

  observeConnect(event: ObservedConnect): void {
    if (event.error != null) {
      this.logger.error(
        "%s: Problem connecting to %s, (%s)",
        this.label,
        event.address,
        errorMessage(event.error),
      );
      return;
    }

    this.logger.debug("%s: Opened new connection to %s", this.label, event.address);
  }
}
