import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  countPrices,
  createPriceStore,
  findAllPrices,
  findPricesBetween,
  findPricesBySymbol,
  listSymbols,
  openDatabase,
  upsertPrices,
} from "../db";
import { HOUR, JAN_1, priceRecords } from "./helpers";

describe("price storage", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
    upsertPrices(db, priceRecords);
  });

  afterEach(() => {
    db.close();
  });

  test("stores every record once", () => {
    expect(countPrices(db)).toBe(15);
    expect(listSymbols(db)).toEqual(["BTC", "DOGE", "ETH", "LTC", "XRP"]);
    expect(findAllPrices(db)).toHaveLength(15);
  });

  test("returns one symbol's prices in time order", () => {
    const btc = findPricesBySymbol(db, "BTC");
    expect(btc.map((o) => o.price.toFixed())).toEqual(["46813.21", "34875", "47222.66"]);
    expect(btc.map((o) => o.timestamp)).toEqual([
      JAN_1 + 4 * HOUR,
      JAN_1 + 13 * HOUR,
      JAN_1 + 742 * HOUR,
    ]);
  });

  test("matches symbols case-sensitively", () => {
    expect(findPricesBySymbol(db, "btc")).toEqual([]);
  });

  test("replaces the price of an existing (symbol, timestamp)", () => {
    upsertPrices(db, [{ symbol: "BTC", timestamp: JAN_1 + 13 * HOUR, price: "35000.5" }]);

    expect(countPrices(db)).toBe(15);
    expect(findPricesBySymbol(db, "BTC")[1].price.toFixed()).toBe("35000.5");
  });

  test("keeps decimal prices exact", () => {
    upsertPrices(db, [{ symbol: "SHIB", timestamp: JAN_1, price: "0.10000000000000000001" }]);
    expect(findPricesBySymbol(db, "SHIB")[0].price.toFixed()).toBe("0.10000000000000000001");
  });

  test("range query includes both bounds", () => {
    const rows = findPricesBetween(db, JAN_1 + HOUR, JAN_1 + 4 * HOUR);
    expect(rows.map((o) => `${o.symbol}@${(o.timestamp - JAN_1) / HOUR}`)).toEqual([
      "LTC@1",
      "XRP@2",
      "BTC@4",
    ]);
  });

  test("adapts to the PriceStore contract", () => {
    const store = createPriceStore(db);
    expect(store.findBySymbol("ETH")).toHaveLength(3);
    expect(store.findByTimestampRange(JAN_1, JAN_1)).toHaveLength(1);
    expect(store.findAll()).toHaveLength(15);
  });

  test("ignores an empty batch", () => {
    expect(upsertPrices(db, [])).toBe(0);
  });
});
