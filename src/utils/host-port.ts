import { AddressParseError } from "../errors.js";

export interface HostPort {
  host: string;
  port: number;
}

const PORT_PATTERN = /^\d{1,5}$/;

/**
 * Split a `host:port` or `[host]:port` address. IPv6 hosts must be
 * bracketed. Throws {@link AddressParseError} on malformed input, an empty
 * host, or a port outside 0..65535.
 */
export function splitHostPort(address: string): HostPort {
  let host: string;
  let portText: string;

  if (address.startsWith("[")) {
    const end = address.indexOf("]");
    if (end < 0) throw new AddressParseError(address, "missing ']' in address");
    if (address[end + 1] !== ":") {
      throw new AddressParseError(
        address,
        end + 1 === address.length ? "missing port in address" : "unexpected text after ']'",
      );
    }
    host = address.slice(1, end);
    portText = address.slice(end + 2);
  } else {
    const colon = address.lastIndexOf(":");
    if (colon < 0) throw new AddressParseError(address, "missing port in address");
    host = address.slice(0, colon);
    if (host.includes(":")) throw new AddressParseError(address, "too many colons in address");
    portText = address.slice(colon + 1);
  }

  if (host === "") throw new AddressParseError(address, "missing host in address");
  if (!PORT_PATTERN.test(portText) || Number(portText) > 65535) {
    throw new AddressParseError(address, "invalid port");
  }

  return { host, port: Number(portText) };
}

/** Inverse of {@link splitHostPort}: brackets hosts that contain a colon. */
export function joinHostPort(host: string, port: number | string): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}
