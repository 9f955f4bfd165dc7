import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config";
import {
  closeDatabase,
  countPrices,
  createPriceStore,
  initDatabase,
  listSymbols,
} from "./db";
import { logger } from "./logger";
import { loadPriceDirectory } from "./price-loader";
import { StatsService } from "./stats-service";

async function main() {
  const config = loadConfig();
  logger.info({ config }, "Crypto API starting");

  const db = initDatabase(config);
  const statsService = new StatsService(createPriceStore(db), config);

  if (config.LOAD_ON_STARTUP) {
    await loadPriceDirectory(db, config.PRICES_DIR);
  } else {
    logger.warn("LOAD_ON_STARTUP disabled - serving prices already in the database");
  }

  const app = createApp({
    config,
    statsService,
    prices: {
      summary: () => ({
        observations: countPrices(db),
        symbols: listSymbols(db).length,
      }),
      reload: () => loadPriceDirectory(db, config.PRICES_DIR),
    },
  });

  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, pricesDir: config.PRICES_DIR }, "Crypto API listening");
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    server.close(() => {
      statsService.close();
      closeDatabase();
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  logger.error({ error }, "Fatal API error");
  process.exit(1);
});
