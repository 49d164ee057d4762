/**
 * Structured logger using Winston.
 * Tags every message with the emitting component. Everything goes to stderr
 * so that command output on stdout can be piped.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

const logFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const tag = component ? `[${component}]` : "[igdeal]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} ${level} ${tag} ${message}${metaStr}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "warn",
  format: combine(
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: LEVELS,
      format: combine(colorize(), logFormat),
    }),
  ],
});

/** Create a child logger tagged with a component name */
export function componentLogger(component: string) {
  return logger.child({ component });
}

/** Change the level at runtime, e.g. from a `--verbose` flag */
export function setLogLevel(level: string): void {
  logger.level = level;
}
