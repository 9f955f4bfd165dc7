import cors from "cors";
import express, { type Express } from "express";
import type { ApiConfig } from "./config";
import { logger } from "./logger";
import { createRateLimiter } from "./rate-limit";
import { type PriceAdmin, createRouter } from "./routes";
import type { StatsService } from "./stats-service";

export interface AppDependencies {
  config: Pick<ApiConfig, "RATE_LIMIT_WINDOW_MS" | "RATE_LIMIT_MAX" | "TRUST_PROXY">;
  statsService: StatsService;
  prices: PriceAdmin;
}

export function createApp({ config, statsService, prices }: AppDependencies): Express {
  const app = express();

  if (config.TRUST_PROXY) {
    app.set("trust proxy", true);
  }

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      const duration = Date.now() - start;
      logger.info(
        {
          method: req.method,
          path: req.path,
          ip: req.ip,
          status: res.statusCode,
          duration,
        },
        "request completed",
      );
    });
    next();
  });

  // Routes
  app.use("/api", createRateLimiter(config), createRouter(statsService, prices));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      name: "Crypto Analyzer API",
      version: "0.1.0",
      endpoints: {
        health: "/api/health",
        stats: "/api/cryptos/:symbol/stats",
        statsText: "/api/cryptos/:symbol/stats-string",
        ranking: "/api/cryptos/ranking",
        highestRange: "/api/cryptos/highest-range",
        highestRangeText: "/api/cryptos/highest-range-string",
        dayHighestRange: "/api/cryptos/:date/highest-normalized-range",
        dayHighestRangeText: "/api/cryptos/:date/highest-normalized-range-string",
        reload: "POST /api/prices/reload",
      },
    });
  });

  // Error handler
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction,
    ) => {
      logger.error({ err, path: req.path }, "Unhandled error");
      res.status(500).json({ error: "Internal server error" });
    },
  );

  return app;
}
