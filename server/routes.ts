import fs from "fs";
import path from "path";
import express, { type Express } from "express";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { applySecurity } from "./middleware/security";
import { registerWatchdogRoutes, type WatchdogRouteDeps } from "./routes/watchdog";
import { apiRequestLogger, withRequestId } from "./utils/logger";

export interface AppOptions extends WatchdogRouteDeps {
  corsOrigin: string | string[];
}

// server/public next to the sources; dist/ has no copy, so fall back to the project tree
function resolvePublicDir(): string | null {
  const candidates = [
    path.join(__dirname, "public"),
    path.resolve(process.cwd(), "server", "public"),
  ];
  return candidates.find((dir) => fs.existsSync(path.join(dir, "index.html"))) ?? null;
}

export function registerRoutes(app: Express, options: AppOptions): void {
  registerWatchdogRoutes(app, options);

  const publicDir = resolvePublicDir();
  if (publicDir) {
    app.use(express.static(publicDir, { index: "index.html" }));
  }

  app.use(notFoundHandler);
  app.use(errorHandler);
}

export function createApp(options: AppOptions): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(withRequestId);
  applySecurity(app, options.corsOrigin);
  app.use(express.json({ limit: "100kb" }));
  app.use(apiRequestLogger);

  registerRoutes(app, options);
  return app;
}
