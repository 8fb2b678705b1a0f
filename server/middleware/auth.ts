/**
 * Control endpoint authentication - static bearer token
 *
 * Enabled when CONTROL_TOKEN is set. Without a token the middleware lets
 * every request through.
 */

import type { RequestHandler } from "express";
import crypto from "crypto";
import { UnauthorizedError } from "../errors/app-errors";

function tokensMatch(provided: string, expected: string): boolean {
  const a = crypto.createHash("sha256").update(provided).digest();
  const b = crypto.createHash("sha256").update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

export function requireControlToken(expectedToken: string | undefined): RequestHandler {
  return (req, _res, next) => {
    if (!expectedToken) {
      return next();
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return next(new UnauthorizedError("Missing or invalid authorization header"));
    }

    if (!tokensMatch(authHeader.substring(7), expectedToken)) {
      return next(new UnauthorizedError("Invalid control token"));
    }

    next();
  };
}
