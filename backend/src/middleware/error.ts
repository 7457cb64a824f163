// src/middleware/error.ts
import { Request, Response, NextFunction } from "express";
import { HttpError } from "../errors";
import type { Logger } from "../logger";

interface ResolvedError {
  status: number;
  message: string;
}

// HttpError, or an http-errors style error from body-parser (400 bad JSON, 413 too large)
function resolve(err: unknown): ResolvedError {
  if (err instanceof HttpError) {
    return { status: err.status, message: err.expose ? err.message : "internal_error" };
  }
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    const status = err.status;
    if (status >= 400 && status < 600) {
      const expose = "expose" in err && err.expose === true;
      return { status, message: expose ? err.message : "internal_error" };
    }
  }
  return { status: 500, message: "internal_error" };
}

export function errorHandler(log: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, message } = resolve(err);
    if (status >= 500) log.error({ err }, "request failed");
    else log.info({ status, reason: message }, "request rejected");
    res.status(status).json({ error: message });
  };
}
