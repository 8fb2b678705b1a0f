import helmet from "helmet";
import cors from "cors";
import type { Express } from "express";

export function applySecurity(app: Express, corsOrigin: string | string[]) {
  // Helmet - common HTTP hardening headers
  app.use(helmet({
    crossOriginResourcePolicy: { policy: "cross-origin" },
    contentSecurityPolicy: false, // dashboard uses an inline script
    crossOriginEmbedderPolicy: false
  }));

  app.use(cors({
    origin: corsOrigin,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
    exposedHeaders: ["X-Request-ID"]
  }));
}
