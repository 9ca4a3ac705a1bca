import { z } from "zod";
import { Level, parseLevel } from "../core/level.js";

const nonEmpty = z.string().trim().min(1);

/** Accepts a `Level` value or a level name in any case; yields a `Level`. */
export const levelSchema = z
  .union([z.nativeEnum(Level), z.string()])
  .transform((value, ctx) => {
    const level = parseLevel(value);
    if (level === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unsupported log level ${JSON.stringify(value)}`,
      });
      return z.NEVER;
    }
    return level;
  });

export const loggerConfigSchema = z.object({
  serviceName: nonEmpty,
  serviceType: nonEmpty.optional(),
  minimumLevel: levelSchema.default(Level.INFO),
});

export type LoggerConfigInput = z.input<typeof loggerConfigSchema>;
export type LoggerConfig = z.output<typeof loggerConfigSchema>;
