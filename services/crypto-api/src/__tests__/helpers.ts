import type { PriceRecord } from "../db";

// 2022-01-01T00:00:00Z
export const JAN_1 = 1_640_995_200_000;
export const HOUR = 3_600_000;

function record(symbol: string, hours: number, price: string): PriceRecord {
  return { symbol, timestamp: JAN_1 + hours * HOUR, price };
}

/** ETH > XRP > DOGE > LTC > BTC by normalized range over all data. */
export const priceRecords: PriceRecord[] = [
  record("BTC", 4, "46813.21"),
  record("BTC", 13, "34875.00"),
  record("BTC", 742, "47222.66"),
  record("DOGE", 0, "0.1702"),
  record("DOGE", 30, "0.1290"),
  record("DOGE", 60, "0.1941"),
  record("ETH", 5, "3715.32"),
  record("ETH", 13, "2336.52"),
  record("ETH", 742, "3823.82"),
  record("LTC", 1, "148.1"),
  record("LTC", 90, "103.4"),
  record("LTC", 120, "151.5"),
  record("XRP", 2, "0.8298"),
  record("XRP", 48, "0.5383"),
  record("XRP", 96, "0.8458"),
];
