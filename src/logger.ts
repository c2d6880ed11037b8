import winston from "winston";
import type { Logger } from "./types";

export const logLevels = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof logLevels)[number];

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return logLevels.some((level) => level === value);
}

/**
 * Console logger used when no logger is injected. Meta is printed as
 * key=value pairs after the message, `label` as a bracketed prefix.
 */
export function createLogger({
  level,
  silent = false,
}: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();

  return winston.createLogger({
    level: level ?? (isLogLevel(envLevel) ? envLevel : "info"),
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, label, ...meta }) => {
        const prefix = typeof label === "string" ? `[${label}] ` : "";
        const pairs = Object.entries(meta)
          .map(([key, value]) => {
            const text =
              typeof value === "string" ? value : JSON.stringify(value);
            return `${key}=${text}`;
          })
          .join(" ");
        return `${String(timestamp)} ${level}: ${prefix}${String(message)}${
          pairs ? ` ${pairs}` : ""
        }`;
      })
    ),
    transports: [new winston.transports.Console()],
  });
}

let defaultLogger: Logger | undefined;

export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
