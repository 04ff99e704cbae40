import pino from "pino";
import type { LogLevel } from "./config.ts";

/** Current UTC time as `YYYY-MM-DDTHH:MM:SSZ`. */
export function isoSeconds(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export type Logger = pino.Logger;

/**
 * One JSON object per line: `level` as an uppercase label, `ts` at second
 * precision and `message`. Tests hand in their own destination to capture
 * the lines.
 */
export function createLogger(
  level: LogLevel,
  destination?: pino.DestinationStream
): Logger {
  const options: pino.LoggerOptions = {
    level,
    base: null,
    messageKey: "message",
    timestamp: () => `,"ts":"${isoSeconds()}"`,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

export type RequestLogFields = {
  method: string;
  path: string;
  status: number;
  latency_ms: number;
};

export function logRequest(log: Logger, fields: RequestLogFields): void {
  log.info(fields, `${fields.method} ${fields.path} ${fields.status}`);
}
