/** Outcome of one attempt by a database driver to open a connection. */
export interface ObservedConnect {
  /** Target `host:port`. */
  address: string;
  /** Set when the attempt failed. */
  error?: unknown;
}

export interface ConnectObserver {
  observeConnect(event: ObservedConnect): void;
}
