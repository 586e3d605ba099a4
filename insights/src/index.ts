import { createApp } from "./app";
import { config } from "./config";
import { Database } from "./lib/db";
import { Logger } from "./lib/logger";
import { InsightsService } from "./services/insights";

const logger = new Logger("insights.server", config.LOG_LEVEL);
const database = new Database(config.DATABASE_URL);
const service = new InsightsService(config, database, { logger: new Logger("insights.service", config.LOG_LEVEL) });
const app = createApp(service, logger);

const server = app.listen(config.PORT, () => {
  logger.info("server_started", {
    port: config.PORT,
    log_level: config.LOG_LEVEL,
    persistence: database.isEnabled() ? "enabled" : "disabled",
    request_timeout_ms: config.REQUEST_TIMEOUT_MS,
    fetch_max_retries: config.FETCH_MAX_RETRIES,
    fetch_backoff_ms: config.FETCH_BACKOFF_MS
  });
});

const shutdown = async (): Promise<void> => {
  logger.info("shutdown_started");
  server.close();
  await database.close();
  logger.info("shutdown_completed");
};

process.on("SIGINT", () => {
  void shutdown();
});

process.on("SIGTERM", () => {
  void shutdown();
});
