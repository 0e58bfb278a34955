import { serve } from "@hono/node-server";
import type Database from "better-sqlite3";
import { createApp } from "./api/app.js";
import { DrizzleSessionRepository } from "./auth/drizzle-session-repository.js";
import type { ISessionRepository, SessionCookieOptions } from "./auth/index.js";
import { SessionService } from "./auth/index.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { openSessionDb } from "./db/index.js";
import { createEmbedTokenMinter } from "./embed/token-minter.js";
import { InMemorySessionRepository } from "./infrastructure/persistence/in-memory-session-repository.js";
import { registerProcessHandlers } from "./process-handlers.js";
import { loadUserDirectory } from "./users/user-directory.js";
import { validateRequiredEnvVars } from "./validate-env.js";

const SESSION_PURGE_INTERVAL_MS = 15 * 60 * 1000;

registerProcessHandlers();
validateRequiredEnvVars();

const directory = loadUserDirectory(config.demoUsersPath);

let sqlite: Database.Database | undefined;
let sessionRepo: ISessionRepository;
if (config.session.dbPath) {
  const opened = openSessionDb(config.session.dbPath);
  sqlite = opened.sqlite;
  sessionRepo = new DrizzleSessionRepository(opened.db);
} else {
  sessionRepo = new InMemorySessionRepository();
}

const sessions = new SessionService(sessionRepo, directory, { ttlMs: config.session.ttlMs });

const cookie: SessionCookieOptions = {
  name: config.session.cookieName,
  ttlMs: config.session.ttlMs,
  secure: config.nodeEnv === "production",
};

const app = createApp({
  sessions,
  cookie,
  minter: createEmbedTokenMinter(config.analytics),
  analytics: config.analytics,
  uiOrigin: config.uiOrigin,
});

logger.info(`embed-token-service starting on port ${config.port}`, {
  users: directory.usernames().length,
  sessionStore: sqlite ? "sqlite" : "memory",
});

const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, () => {
  logger.info(`embed-token-service listening on http://${config.host}:${config.port}`);
});

const purgeTimer = setInterval(() => {
  sessions
    .purgeExpired()
    .then((removed) => {
      if (removed > 0) logger.debug("Purged expired sessions", { removed });
    })
    .catch((err: unknown) => {
      logger.error("Session purge failed", { error: err instanceof Error ? err.message : String(err) });
    });
}, SESSION_PURGE_INTERVAL_MS);
purgeTimer.unref();

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`Received ${signal}, shutting down`);
  clearInterval(purgeTimer);
  server.close((err) => {
    if (err) logger.error("Error while closing HTTP server", { error: err.message });
    sqlite?.close();
    process.exit(err ? 1 : 0);
  });
}

process.once("SIGTERM", shutdown);
process.once("SIGINT", shutdown);
