import {
  type RankingEntry,
  type SymbolStats,
  toReportingScale,
} from "@crypto-analyzer/price-stats";
import { Decimal } from "decimal.js";

// Prices are shown with at most four fractional digits (half-even), trailing zeros dropped
const PRICE_DIGITS = 4;

export const SYMBOL_NOT_FOUND_TEXT = "The cryptocurrency was not found.";
export const DAY_NOT_FOUND_TEXT = "No records found for the specified date.";

export interface StatsResponse {
  symbol: string;
  oldestPrice: string;
  newestPrice: string;
  minPrice: string;
  maxPrice: string;
  oldestTimestamp: string;
  newestTimestamp: string;
}

export interface RankingResponse {
  symbol: string;
  normalizedValue: string;
  minPrice: string;
  maxPrice: string;
}

export function formatPrice(price: Decimal): string {
  return price.toDecimalPlaces(PRICE_DIGITS, Decimal.ROUND_HALF_EVEN).toFixed();
}

export function toUtcString(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

export function toStatsResponse(stats: SymbolStats): StatsResponse {
  return {
    symbol: stats.symbol,
    oldestPrice: stats.oldest.price.toFixed(),
    newestPrice: stats.newest.price.toFixed(),
    minPrice: stats.minPrice.toFixed(),
    maxPrice: stats.maxPrice.toFixed(),
    oldestTimestamp: toUtcString(stats.oldest.timestamp),
    newestTimestamp: toUtcString(stats.newest.timestamp),
  };
}

export function toRankingResponse(entry: RankingEntry): RankingResponse {
  return {
    symbol: entry.symbol,
    normalizedValue: entry.normalizedValue.toFixed(),
    minPrice: entry.minPrice.toFixed(),
    maxPrice: entry.maxPrice.toFixed(),
  };
}

export function statsText(stats: SymbolStats): string {
  return [
    `Crypto ${stats.symbol}:`,
    `Oldest Price: ${formatPrice(stats.oldest.price)}`,
    `Newest Price: ${formatPrice(stats.newest.price)}`,
    `Min Price: ${formatPrice(stats.minPrice)}`,
    `Max Price: ${formatPrice(stats.maxPrice)}`,
  ].join("\n");
}

export function rankingText(ranking: RankingEntry[]): string {
  return ranking
    .map(
      (entry) =>
        `Crypto: ${entry.symbol}  Normalized Value: ${toReportingScale(entry.normalizedValue)}\n`,
    )
    .join("");
}

export function dayRangeText(entry: Pick<RankingEntry, "symbol" | "normalizedValue">): string {
  return `Crypto ${entry.symbol}:\nNormalized Range: ${toReportingScale(entry.normalizedValue)}`;
}
