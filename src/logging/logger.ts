import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

// Credentials never reach a log line, whichever hop logs them.
export const REDACTED_PATHS = [
  "password",
  "accessToken",
  "identityToken",
  "refreshToken",
  "*.password",
  "*.accessToken",
  "*.identityToken",
  "*.refreshToken",
  "headers.authorization",
  'headers["x-internal-key"]',
];

export function createLogger(config?: LoggingConfig, destination?: pino.DestinationStream): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  if (level === "silent") return pino({ level });

  const base: pino.LoggerOptions = {
    level,
    redact: { paths: REDACTED_PATHS, censor: "[REDACTED]" },
  };

  if (destination) return pino(base, destination);

  // A file destination and a transport are mutually exclusive in pino.
  if (config?.file) {
    return pino(base, pino.destination(config.file));
  }

  return pino(transport ? { ...base, transport } : base);
}
