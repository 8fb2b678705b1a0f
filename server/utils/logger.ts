import pino from "pino";
import { randomUUID } from "crypto";
import type { Request, Response, NextFunction } from "express";

declare module "express-serve-static-core" {
  interface Request {
    requestId?: string;
  }
}

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

// Structured logger
export const log = pino({
  level: resolveLevel(),
  transport: process.env.NODE_ENV === "development" ? {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss",
      ignore: "pid,hostname"
    }
  } : undefined
});

export type Logger = typeof log;

// Tags every request with an id
export function withRequestId(req: Request, res: Response, next: NextFunction) {
  const header = req.headers["x-request-id"];
  req.requestId = typeof header === "string" && header.length > 0 ? header : randomUUID();
  res.setHeader("X-Request-ID", req.requestId);
  next();
}

// Request-scoped child logger
export function reqLog(req: Request) {
  return log.child({
    rid: req.requestId,
    path: req.path,
    method: req.method
  });
}

/**
 * Logs one line per finished /api request
 */
export function apiRequestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on("finish", () => {
    if (!req.path.startsWith("/api")) {
      return;
    }
    reqLog(req).info({ status: res.statusCode, durationMs: Date.now() - start }, "request completed");
  });

  next();
}

export default log;
