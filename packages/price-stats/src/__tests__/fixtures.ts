import { Decimal } from "decimal.js";
import type { PriceObservation, PriceStore } from "../types.ts";

export function observation(
  symbol: string,
  timestamp: number,
  price: string,
): PriceObservation {
  return { symbol, timestamp, price: new Decimal(price) };
}

export function memoryStore(observations: PriceObservation[]): PriceStore {
  return {
    findBySymbol: (symbol) => observations.filter((o) => o.symbol === symbol),
    findByTimestampRange: (start, end) =>
      observations.filter((o) => o.timestamp >= start && o.timestamp <= end),
    findAll: () => [...observations],
  };
}

// 2022-01-01T00:00:00Z
export const JAN_1 = 1_640_995_200_000;
export const HOUR = 3_600_000;

/** Five symbols, ETH > XRP > DOGE > LTC > BTC by normalized range. */
export const fiveSymbols: PriceObservation[] = [
  observation("BTC", JAN_1 + 4 * HOUR, "46813.21"),
  observation("BTC", JAN_1 + 13 * HOUR, "34875.00"),
  observation("BTC", JAN_1 + 742 * HOUR, "47222.66"),
  observation("DOGE", JAN_1, "0.1702"),
  observation("DOGE", JAN_1 + 30 * HOUR, "0.1290"),
  observation("DOGE", JAN_1 + 60 * HOUR, "0.1941"),
  observation("ETH", JAN_1 + 5 * HOUR, "3715.32"),
  observation("ETH", JAN_1 + 13 * HOUR, "2336.52"),
  observation("ETH", JAN_1 + 742 * HOUR, "3823.82"),
  observation("LTC", JAN_1 + HOUR, "148.1"),
  observation("LTC", JAN_1 + 90 * HOUR, "103.4"),
  observation("LTC", JAN_1 + 120 * HOUR, "151.5"),
  observation("XRP", JAN_1 + 2 * HOUR, "0.8298"),
  observation("XRP", JAN_1 + 48 * HOUR, "0.5383"),
  observation("XRP", JAN_1 + 96 * HOUR, "0.8458"),
];

/** Observations on 2022-01-01 plus a few just outside the day. */
export const newYearsDay: PriceObservation[] = [
  observation("BTC", JAN_1 - 1_000, "99999"),
  observation("BTC", JAN_1 + 4 * HOUR, "46813.21"),
  observation("BTC", JAN_1 + 7 * HOUR, "46979.61"),
  observation("BTC", JAN_1 + 10 * HOUR, "47143.98"),
  observation("BTC", JAN_1 + 24 * HOUR, "30000"),
  observation("DOGE", JAN_1, "0.1702"),
  observation("DOGE", JAN_1 + 12 * HOUR, "0.1722"),
  observation("ETH", JAN_1 + 5 * HOUR, "3715.32"),
  observation("ETH", JAN_1 + 13 * HOUR, "3718.67"),
  observation("ETH", JAN_1 + 22 * HOUR, "3697.04"),
  observation("LTC", JAN_1 + HOUR, "148.1"),
  observation("LTC", JAN_1 + 24 * HOUR - 1_000, "148.66"),
  observation("XRP", JAN_1 + 2 * HOUR, "0.8298"),
  observation("XRP", JAN_1 + 15 * HOUR, "0.8458"),
];
