import {
  type DayRangeResult,
  type PriceStore,
  type RankingEntry,
  type SymbolStatsResult,
  highestRangeForDay,
  rankedBySymbol,
  statsFor,
} from "@crypto-analyzer/price-stats";
import NodeCache from "node-cache";
import type { ApiConfig } from "./config";
import { logger } from "./logger";

const RANKING_KEY = "ranking";

/**
 * Request-facing wrapper around the statistics core. The ranking and per-day
 * answers are cached until the TTL expires or new prices are loaded.
 */
export class StatsService {
  private cache: NodeCache;

  constructor(
    private store: PriceStore,
    config: Pick<ApiConfig, "CACHE_TTL_SECONDS">,
  ) {
    this.cache = new NodeCache({
      stdTTL: config.CACHE_TTL_SECONDS,
      checkperiod: config.CACHE_TTL_SECONDS * 2,
      // Decimal instances are immutable, cloning would only cost time
      useClones: false,
    });
  }

  getStats(symbol: string): SymbolStatsResult {
    logger.info({ symbol }, "Fetching price stats");
    return statsFor(this.store, symbol);
  }

  /**
   * Callers get their own copy; the cached array is shared and never mutated
   */
  getRanking(): RankingEntry[] {
    const cached = this.cache.get<RankingEntry[]>(RANKING_KEY);
    if (cached) {
      return [...cached];
    }

    const ranking = rankedBySymbol(this.store, { logger });
    this.cache.set(RANKING_KEY, ranking);
    return [...ranking];
  }

  getHighestRangeForDay(date: string): DayRangeResult {
    const cacheKey = `day:${date}`;
    const cached = this.cache.get<DayRangeResult>(cacheKey);
    if (cached) {
      return cached;
    }

    const result = highestRangeForDay(this.store, date, { logger });
    if (result.status === "invalid-input") {
      logger.warn({ date }, "Rejected malformed date");
      return result;
    }

    this.cache.set(cacheKey, result);
    return result;
  }

  /**
   * Clear the cache (after prices change)
   */
  clearCache(): void {
    this.cache.flushAll();
    logger.debug("Stats cache cleared");
  }

  /**
   * Stop the cache's expiry timer so the process can exit
   */
  close(): void {
    this.cache.close();
  }
}
