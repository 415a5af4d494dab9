/**
 * Structured Logger (Pino)
 *
 * JSON lines in production, pino-pretty in development. Errors are
 * logged under `err` with the standard serializer.
 */
import pino from "pino";
import config from "../config";

export const logger = pino({
  level: config.logLevel,
  base: { service: "state-events-watch", pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: { err: pino.stdSerializers.err },
  transport:
    config.env === "development"
      ? { target: "pino-pretty", options: { colorize: true, translateTime: "SYS:standard" } }
      : undefined,
});

/** Logger bound to one check scope */
export function scopeLogger(scope: string): pino.Logger {
  return logger.child({ scope });
}
