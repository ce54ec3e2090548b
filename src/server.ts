import type { Server } from "http";
import { createApp } from "./app";
import { loadConfig } from "./utils/config";
import { Logger } from "./utils/logger";
import { RateLimiter, ScoreboardCache } from "./utils/memory";
import { MongoParticipantStore } from "./store/mongoStore";
import { HitIngestionService } from "./scoreboard-service/hitIngestion";
import { ScoreboardQueryService } from "./scoreboard-service/scoreboardQuery";

const logger = new Logger("server");

const start = async (): Promise<void> => {
  const config = loadConfig();

  const store = await MongoParticipantStore.connect(
    config.mongoUri,
    config.dbName,
    config.storeTimeoutMs
  );
  await store.ensureIndexes();

  const rateLimiter = new RateLimiter({
    cooldownMs: config.rateLimitMs,
    sweepIntervalMs: config.rateLimitSweepMs,
  });
  rateLimiter.start();

  const app = createApp({
    hitIngestion: new HitIngestionService(store, rateLimiter, config.storeTimeoutMs),
    scoreboardQuery: new ScoreboardQueryService(
      store,
      new ScoreboardCache(config.cacheTtlMs),
      config.storeTimeoutMs
    ),
  });

  const server: Server = app.listen(config.port, () => {
    logger.info(`SCOREBOARD API LIVE ON PORT ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    rateLimiter.stop();
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("Failed to close MongoDB client", error);
          process.exit(1);
        });
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

process.on("uncaughtException", (error) => {
  logger.error(
    `Could not initialise server due to ${
      error instanceof Error ? error.message : "Unknown Error"
    }`,
    error
  );
  process.exit(1);
});

start().catch((error: unknown) => {
  logger.error(
    `Could not start server due to ${
      error instanceof Error ? error.message : "Unknown Error"
    }`,
    error
  );
  process.exit(1);
});
