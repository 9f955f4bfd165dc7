import type { Decimal } from "decimal.js";
import type { Logger } from "pino";

export interface PriceObservation {
  readonly symbol: string;
  /**
   * Milliseconds since epoch, UTC.
   */
  readonly timestamp: number;
  readonly price: Decimal;
}

export interface SymbolStats {
  symbol: string;
  oldest: PriceObservation;
  newest: PriceObservation;
  minPrice: Decimal;
  maxPrice: Decimal;
}

export interface RankingEntry {
  symbol: string;
  normalizedValue: Decimal;
  minPrice: Decimal;
  maxPrice: Decimal;
}

/**
 * Read side of the price storage. Range bounds are inclusive.
 */
export interface PriceStore {
  findBySymbol(symbol: string): PriceObservation[];
  findByTimestampRange(start: number, end: number): PriceObservation[];
  findAll(): PriceObservation[];
}

export type StatsLogger = Pick<Logger, "debug" | "warn">;

export interface StatsOptions {
  logger?: StatsLogger;
}

export interface DayWindow {
  date: string;
  start: number;
  end: number;
}

export type SymbolStatsResult =
  | { status: "found"; stats: SymbolStats }
  | { status: "not-found"; symbol: string };

export type DayRangeResult =
  | ({ status: "found"; date: string } & RankingEntry)
  | { status: "not-found"; date: string; symbol: ""; normalizedValue: Decimal }
  | { status: "invalid-input"; date: string; message: string };

/** Fractional digits kept when ratios are compared or sorted. */
export const RANKING_SCALE = 10;

/** Fractional digits shown when a ratio is reported to a reader. */
export const REPORTING_SCALE = 3;

export const INVALID_DATE_MESSAGE = "Invalid date format. Please use YYYY-MM-DD.";
