import type { IncomingMessage } from "node:http";
import { AddressParseError } from "../errors.js";
import { joinHostPort, splitHostPort } from "../utils/host-port.js";
import type { RequestFields } from "./log-record.js";

export const REQUEST_ID_HEADER = "x-request-id";
export const FORWARDED_FOR_HEADER = "x-forwarded-for";

export type RequestHeaders = Record<string, string | string[] | undefined>;

/** Framework-neutral view of an inbound request. */
export interface RequestInfo {
  headers: RequestHeaders;
  /** Peer address in `host:port` form. */
  remoteAddress?: string;
}

export type InboundRequest = IncomingMessage | RequestInfo;

export interface ExtractedRequestFields {
  fields: RequestFields;
  /** Set when the peer address is missing or could not be parsed. */
  addressError?: AddressParseError;
}

/** First value of a header, matched case-insensitively. Empty values count as absent. */
export function headerValue(headers: RequestHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  let raw = headers[wanted];
  if (raw === undefined) {
    const key = Object.keys(headers).find((k) => k.toLowerCase() === wanted);
    raw = key === undefined ? undefined : headers[key];
  }
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value ? value : undefined;
}

export function peerAddress(request: InboundRequest): string {
  if ("socket" in request) {
    const { remoteAddress, remotePort } = request.socket;
    if (remoteAddress === undefined || remotePort === undefined) return "";
    return joinHostPort(remoteAddress, remotePort);
  }
  return request.remoteAddress ?? "";
}

/**
 * Pull trace id, client address/port and forwarded-for address out of a
 * request. Each is independent; a malformed peer address only drops the
 * client block.
 */
export function extractRequestFields(request: InboundRequest): ExtractedRequestFields {
  const fields: { -readonly [K in keyof RequestFields]: RequestFields[K] } = {};
  let addressError: AddressParseError | undefined;

  const id = headerValue(request.headers, REQUEST_ID_HEADER);
  if (id) fields.trace = Object.freeze({ id });

  const address = peerAddress(request);
  try {
    const { host, port } = splitHostPort(address);
    fields.client = Object.freeze({ ip: host, port });
  } catch (err) {
    if (!(err instanceof AddressParseError)) throw err;
    addressError = err;
  }

  const forwarded = headerValue(request.headers, FORWARDED_FOR_HEADER);
  if (forwarded) fields.network = Object.freeze({ forwarded_ip: forwarded });

  return { fields: Object.freeze(fields), addressError };
}
