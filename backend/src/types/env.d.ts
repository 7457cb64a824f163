// src/types/env.d.ts

declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: "development" | "test" | "production";
    PORT?: string;

    // Spawner state storage
    DATABASE_URL?: string;
    PGSSL?: "true" | "false";

    // OIDC provider (discovery base URL + expected issuer)
    OIDC_SERVER?: string;   // e.g. https://idp.example.org/realms/portal
    JWT_AUDIENCE?: string;  // e.g. jupyter
    JWT_LEEWAY?: string;    // seconds, e.g. 5 or 2.5

    // Resource name matched against project resources
    PLATFORM?: string;      // e.g. portal.notebooks.shared

    // Logging
    LOG_LEVEL?: "trace" | "debug" | "info" | "warn" | "error" | "fatal";

    // Build metadata
    GIT_SHA?: string;
  }
}
