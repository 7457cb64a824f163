// src/logger.ts
import pino from "pino";

export type Logger = pino.Logger;

export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({
    name: "notebook-portal-auth",
    level,
    // id tokens must never reach the logs
    redact: ["req.headers.authorization", 'req.headers["x-auth-id-token"]']
  });
}
