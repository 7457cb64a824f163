// src/server.ts
import { loadConfig } from "./config";
import { createApp } from "./app";
import { createLogger } from "./logger";
import { createPool, queryWith } from "./db";
import { PgSpawnerStateStore } from "./db/spawner-state";
import { OidcAuthenticator } from "./auth/oidc";

async function main() {
  const cfg = loadConfig();
  const logger = createLogger(cfg.logLevel);

  const store = new PgSpawnerStateStore(queryWith(createPool(cfg.pg)));
  await store.migrate();

  const authenticator = new OidcAuthenticator({
    oidcServer: cfg.oidc.server,
    audience: cfg.oidc.audience,
    leeway: cfg.oidc.leeway,
    platform: cfg.platform,
    log: logger
  });

  const app = createApp({ authenticator, store, logger, gitSha: cfg.gitSha });
  app.listen(cfg.port, () => logger.info({ port: cfg.port, platform: cfg.platform }, "API up"));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
