/**
 * Structured logging via pino with credential redaction.
 * Writes to stderr so stdout carries only model output.
 */

import pino from "pino";
import { homedir } from "node:os";
import { join } from "node:path";

const LOG_DIR = join(process.env["OLA_HOME"] ?? join(homedir(), ".ola"), "logs");

const REDACT_PATHS = [
  "apiKey",
  "api_key",
  "token",
  "password",
  "secret",
  "authorization",
  "headers.authorization",
  "headers.Authorization",
  "headers[\"X-API-Key\"]",
  "*.apiKey",
  "*.api_key",
  "*.token",
  "*.secret",
];

const options: pino.LoggerOptions = {
  name: "ola",
  level: process.env["OLA_LOG_LEVEL"] ?? "warn",
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

const logger =
  process.env["NODE_ENV"] === "development"
    ? pino({
        ...options,
        transport: {
          target: "pino/file",
          options: { destination: join(LOG_DIR, "ola.log"), mkdir: true },
        },
      })
    : pino(options, pino.destination(2));

export { logger };
