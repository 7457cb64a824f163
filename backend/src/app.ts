// src/app.ts
import express from "express";
import helmet from "helmet";
import cors from "cors";
import pinoHttp from "pino-http";
import type { Logger } from "./logger";
import { OidcAuthenticator } from "./auth/oidc";
import { errorHandler } from "./middleware/error";
import type { SpawnerStateStore } from "./db/spawner-state";

// ---- Routes ----
import healthRoutes from "./routes/health";
import loginRoutes from "./routes/login";
import spawnRoutes from "./routes/spawn";

export interface AppDeps {
  authenticator: OidcAuthenticator;
  store: SpawnerStateStore;
  logger: Logger;
  gitSha?: string;
}

export function createApp({ authenticator, store, logger, gitSha = "dev" }: AppDeps) {
  const app = express();

  // --- Core middleware ---
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: "64kb" }));
  app.use(express.urlencoded({ extended: true, limit: "64kb" })); // spawn options form posts

  app.use(pinoHttp({ logger }));

  // --- Public routes (no auth) ---
  app.use(healthRoutes(gitSha)); // /healthz, /readyz, /version

  // --- Id-token authenticated ---
  app.use(loginRoutes(authenticator, store)); // /login
  app.use(spawnRoutes(authenticator, store, logger)); // /api/v1/spawn/...

  // --- Global error handler (last) ---
  app.use(errorHandler(logger));

  return app;
}
