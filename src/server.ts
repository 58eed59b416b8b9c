import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { closeDb, maybeGetDb } from "./db/client";
import { createPersonaEngine } from "./engine";
import { createLogger, scopedLogger } from "./logger";
import { DrizzleAssignmentStore, DrizzleFinancialStore, DrizzleSignalCache } from "./storage/drizzle";
import { InMemoryAssignmentStore, InMemoryFinancialStore, InMemorySignalCache } from "./storage/memory";

const config = loadConfig();
const logger = createLogger(config.logLevel);
const db = maybeGetDb(config.databaseUrl);

if (!db) {
  logger.warn("No database configured; using an empty in-memory store");
}

const store = db ? new DrizzleFinancialStore(db) : new InMemoryFinancialStore();

const engine = createPersonaEngine({
  store,
  assignments: db ? new DrizzleAssignmentStore(db) : new InMemoryAssignmentStore(),
  signalCache: db ? new DrizzleSignalCache(db) : new InMemorySignalCache(),
  logger,
  referenceDate: config.referenceDate,
  cacheTtlMs: config.signalCacheTtlMs,
  cacheEnabled: config.signalCacheEnabled,
});

const app = createApp({
  engine,
  store,
  authSecret: config.authSecret,
  logger: scopedLogger(logger, "api"),
});

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info(`Server listening on http://localhost:${config.port}`);

process.on("SIGTERM", () => {
  server.close();
  void closeDb().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error("Failed to close the database pool", error);
      process.exit(1);
    },
  );
});
