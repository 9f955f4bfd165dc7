import { type Response, Router } from "express";
import type { DayRangeResult } from "@crypto-analyzer/price-stats";
import {
  DAY_NOT_FOUND_TEXT,
  SYMBOL_NOT_FOUND_TEXT,
  dayRangeText,
  rankingText,
  statsText,
  toRankingResponse,
  toStatsResponse,
} from "./format";
import { logger } from "./logger";
import type { LoadSummary } from "./price-loader";
import type { StatsService } from "./stats-service";

/**
 * Storage-side operations the routes need besides the statistics
 */
export interface PriceAdmin {
  summary(): { observations: number; symbols: number };
  reload(): Promise<LoadSummary>;
}

export function createRouter(
  statsService: StatsService,
  prices: PriceAdmin,
): Router {
  const router = Router();

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req, res) => {
    try {
      const { observations, symbols } = prices.summary();
      res.json({ status: "healthy", observations, symbols, timestamp: Date.now() });
    } catch (error) {
      logger.error({ error }, "Health check failed");
      res.status(500).json({ status: "unhealthy", timestamp: Date.now() });
    }
  });

  /**
   * GET /api/cryptos/ranking
   * All symbols ordered by normalized range, descending
   */
  router.get("/cryptos/ranking", (req, res) => {
    try {
      res.json(statsService.getRanking().map(toRankingResponse));
    } catch (error) {
      logger.error({ error }, "Failed to rank cryptos");
      res.status(500).json({ error: "Failed to rank cryptos" });
    }
  });

  /**
   * GET /api/cryptos/highest-range
   * The symbol with the highest normalized range over all data
   */
  router.get("/cryptos/highest-range", (req, res) => {
    try {
      const [top] = statsService.getRanking();
      if (!top) {
        return res.status(404).json({ error: "No price data loaded." });
      }
      res.json(toRankingResponse(top));
    } catch (error) {
      logger.error({ error }, "Failed to get highest range");
      res.status(500).json({ error: "Failed to get highest range" });
    }
  });

  /**
   * GET /api/cryptos/highest-range-string
   * Plain-text ranking, one line per symbol
   */
  router.get("/cryptos/highest-range-string", (req, res) => {
    try {
      res.type("text/plain").send(rankingText(statsService.getRanking()));
    } catch (error) {
      logger.error({ error }, "Failed to rank cryptos");
      res.status(500).type("text/plain").send("Failed to rank cryptos");
    }
  });

  /**
   * GET /api/cryptos/:symbol/stats
   * Oldest, newest, min and max price for one symbol
   */
  router.get("/cryptos/:symbol/stats", (req, res) => {
    try {
      const result = statsService.getStats(req.params.symbol);
      if (result.status === "not-found") {
        return res.status(404).json({ error: SYMBOL_NOT_FOUND_TEXT });
      }
      res.json(toStatsResponse(result.stats));
    } catch (error) {
      logger.error({ error, symbol: req.params.symbol }, "Failed to get crypto stats");
      res.status(500).json({ error: "Failed to get crypto stats" });
    }
  });

  router.get("/cryptos/:symbol/stats-string", (req, res) => {
    try {
      const result = statsService.getStats(req.params.symbol);
      if (result.status === "not-found") {
        return res.status(404).type("text/plain").send(SYMBOL_NOT_FOUND_TEXT);
      }
      res.type("text/plain").send(statsText(result.stats));
    } catch (error) {
      logger.error({ error, symbol: req.params.symbol }, "Failed to get crypto stats");
      res.status(500).type("text/plain").send("Failed to get crypto stats");
    }
  });

  /**
   * GET /api/cryptos/:date/highest-normalized-range
   * The day's widest symbol; date is yyyy-MM-dd (UTC)
   */
  router.get("/cryptos/:date/highest-normalized-range", (req, res) => {
    try {
      sendDayRange(res, statsService.getHighestRangeForDay(req.params.date), "json");
    } catch (error) {
      logger.error({ error, date: req.params.date }, "Failed to get day range");
      res.status(500).json({ error: "Failed to get highest normalized range" });
    }
  });

  router.get("/cryptos/:date/highest-normalized-range-string", (req, res) => {
    try {
      sendDayRange(res, statsService.getHighestRangeForDay(req.params.date), "text");
    } catch (error) {
      logger.error({ error, date: req.params.date }, "Failed to get day range");
      res.status(500).type("text/plain").send("Failed to get highest normalized range");
    }
  });

  /**
   * POST /api/prices/reload
   * Re-import the price files and drop cached answers
   */
  router.post("/prices/reload", async (req, res) => {
    try {
      logger.info("Price reload requested via API");
      const summary = await prices.reload();
      statsService.clearCache();
      res.json(summary);
    } catch (error) {
      logger.error({ error }, "Failed to reload prices");
      res.status(500).json({ error: "Failed to reload prices" });
    }
  });

  return router;
}

function sendDayRange(res: Response, result: DayRangeResult, as: "json" | "text"): void {
  switch (result.status) {
    case "invalid-input":
      if (as === "json") {
        res.status(400).json({ error: result.message });
      } else {
        res.status(400).type("text/plain").send(result.message);
      }
      return;
    case "not-found":
      if (as === "json") {
        res.status(404).json({ error: DAY_NOT_FOUND_TEXT });
      } else {
        res.status(404).type("text/plain").send(DAY_NOT_FOUND_TEXT);
      }
      return;
    case "found":
      if (as === "json") {
        res.json({ date: result.date, ...toRankingResponse(result) });
      } else {
        res.type("text/plain").send(dayRangeText(result));
      }
  }
}
