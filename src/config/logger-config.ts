import { ConfigError } from "../errors.js";
import type { Sink } from "../interfaces/sink.js";
import { createLogger, type Logger } from "../core/logger.js";
import { type LoggerConfig, type LoggerConfigInput, loggerConfigSchema } from "./config-schema.js";

/** Environment variables read by {@link loadLoggerConfig}. */
export const ENV_KEYS = {
  serviceName: "SERVICE_NAME",
  serviceType: "SERVICE_TYPE",
  minimumLevel: "LOG_LEVEL",
} as const;

export function resolveLoggerConfig(input: LoggerConfigInput): LoggerConfig {
  const validation = loggerConfigSchema.safeParse(input);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }
  return validation.data;
}

/** Read logger settings from the environment. Blank variables count as unset. */
export function loadLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const read = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };

  return resolveLoggerConfig({
    serviceName: read(ENV_KEYS.serviceName) ?? "",
    serviceType: read(ENV_KEYS.serviceType),
    minimumLevel: read(ENV_KEYS.minimumLevel),
  });
}

export function createLoggerFromEnv(sink?: Sink, env?: NodeJS.ProcessEnv): Logger {
  return createLogger({ ...loadLoggerConfig(env), sink });
}
