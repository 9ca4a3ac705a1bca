/**
 * The JSON line schema, shaped after the Elastic Common Schema (ECS).
 *
 * Optional blocks (`client`, `network`, `trace`, `service.type`) are left
 * out of the object entirely when there is nothing to put in them, so
 * `JSON.stringify` never emits empty objects or nulls for them.
 * @module
 */

import { type Level, levelString } from "./level.js";

/** @see https://www.elastic.co/guide/en/ecs/current/ecs-client.html */
export interface EcsClient {
  ip: string;
  port: number;
}

/** @see https://www.elastic.co/guide/en/ecs/current/ecs-log.html */
export interface EcsLog {
  level: string;
}

/** @see https://www.elastic.co/guide/en/ecs/current/ecs-network.html */
export interface EcsNetwork {
  forwarded_ip: string;
}

/** @see https://www.elastic.co/guide/en/ecs/current/ecs-service.html */
export interface EcsService {
  name: string;
  type?: string;
}

/** @see https://www.elastic.co/guide/en/ecs/current/ecs-tracing.html */
export interface EcsTrace {
  id: string;
}

export interface LogRecord {
  "@timestamp": string;
  message: string;
  client?: EcsClient;
  log: EcsLog;
  network?: EcsNetwork;
  service: EcsService;
  trace?: EcsTrace;
}

/** Request-derived enrichment captured when a scoped logger is created. */
export interface RequestFields {
  readonly client?: Readonly<EcsClient>;
  readonly network?: Readonly<EcsNetwork>;
  readonly trace?: Readonly<EcsTrace>;
}

/** Builds the record for the level that survived filtering. Only called past the level gate. */
export type RecordSupplier = (level: Level) => LogRecord;

export interface RecordInput {
  level: Level;
  message: string;
  service: Readonly<EcsService>;
  fields?: RequestFields;
  time?: Date;
}

/** Assemble a record with keys in wire order, skipping absent enrichment blocks. */
export function buildRecord(input: RecordInput): LogRecord {
  const { fields } = input;
  const service: EcsService = { name: input.service.name };
  if (input.service.type) service.type = input.service.type;

  return {
    "@timestamp": (input.time ?? new Date()).toISOString(),
    message: input.message,
    ...(fields?.client && { client: { ip: fields.client.ip, port: fields.client.port } }),
    log: { level: levelString(input.level) },
    ...(fields?.network && { network: { forwarded_ip: fields.network.forwarded_ip } }),
    service,
    ...(fields?.trace && { trace: { id: fields.trace.id } }),
  };
}
