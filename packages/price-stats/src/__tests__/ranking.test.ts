import { describe, expect, test } from "vitest";
import { rankedBySymbol } from "../queries.ts";
import { groupBySymbol, rankBySymbol } from "../ranking.ts";
import { fiveSymbols, memoryStore, observation } from "./fixtures.ts";

describe("groupBySymbol", () => {
  test("groups by exact symbol in first-appearance order", () => {
    const groups = groupBySymbol([
      observation("ETH", 1, "1"),
      observation("BTC", 2, "2"),
      observation("eth", 3, "3"),
      observation("ETH", 4, "4"),
    ]);
    expect([...groups.keys()]).toEqual(["ETH", "BTC", "eth"]);
    expect(groups.get("ETH")?.map((o) => o.timestamp)).toEqual([1, 4]);
  });
});

describe("rankBySymbol", () => {
  test("orders five symbols by normalized range descending", () => {
    const ranking = rankBySymbol(fiveSymbols);
    expect(ranking.map((entry) => entry.symbol)).toEqual([
      "ETH",
      "XRP",
      "DOGE",
      "LTC",
      "BTC",
    ]);
    expect(ranking.map((entry) => entry.normalizedValue.toFixed(10))).toEqual([
      "0.6365449472",
      "0.5712428014",
      "0.5046511628",
      "0.4651837524",
      "0.3540547670",
    ]);
  });

  test("carries min and max prices per symbol", () => {
    const eth = rankBySymbol(fiveSymbols)[0];
    expect(eth.minPrice.toFixed()).toBe("2336.52");
    expect(eth.maxPrice.toFixed()).toBe("3823.82");
  });

  test("places ETH above BTC", () => {
    const ranking = rankBySymbol(fiveSymbols.filter((o) => o.symbol === "BTC" || o.symbol === "ETH"));
    expect(ranking.map((entry) => entry.symbol)).toEqual(["ETH", "BTC"]);
  });

  test("orders by full precision where three digits would tie", () => {
    const ranking = rankBySymbol([
      observation("AAA", 1, "1000"),
      observation("AAA", 2, "1354"),
      observation("BBB", 1, "1000"),
      observation("BBB", 2, "1354.4"),
    ]);
    expect(ranking.map((entry) => entry.symbol)).toEqual(["BBB", "AAA"]);
  });

  test("keeps first-appearance order on exact ties", () => {
    const ranking = rankBySymbol([
      observation("SOL", 1, "10"),
      observation("ADA", 1, "1"),
      observation("SOL", 2, "20"),
      observation("ADA", 2, "2"),
    ]);
    expect(ranking.map((entry) => entry.symbol)).toEqual(["SOL", "ADA"]);
  });

  test("is empty for an empty dataset", () => {
    expect(rankBySymbol([])).toEqual([]);
  });

  test("gives a single observation a zero value", () => {
    const [entry] = rankBySymbol([observation("DOT", 1, "7.5")]);
    expect(entry.normalizedValue.isZero()).toBe(true);
    expect(entry.minPrice.eq(entry.maxPrice)).toBe(true);
  });

  test("is a descending permutation of the distinct symbols", () => {
    const ranking = rankBySymbol(fiveSymbols);
    const symbols = new Set(fiveSymbols.map((o) => o.symbol));
    expect(new Set(ranking.map((entry) => entry.symbol))).toEqual(symbols);
    expect(ranking).toHaveLength(symbols.size);
    for (let i = 1; i < ranking.length; i++) {
      expect(ranking[i - 1].normalizedValue.gte(ranking[i].normalizedValue)).toBe(true);
    }
  });
});

describe("rankedBySymbol", () => {
  test("returns identical output for repeated calls", () => {
    const store = memoryStore(fiveSymbols);
    const first = rankedBySymbol(store);
    const second = rankedBySymbol(store);
    expect(second.map((e) => [e.symbol, e.normalizedValue.toFixed()])).toEqual(
      first.map((e) => [e.symbol, e.normalizedValue.toFixed()]),
    );
  });
});
