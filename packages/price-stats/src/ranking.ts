import { maxPrice, minPrice } from "./aggregate.ts";
import { normalizedRange } from "./normalized-range.ts";
import type { PriceObservation, RankingEntry, StatsOptions } from "./types.ts";

/**
 * Groups by exact symbol string. Map order follows first appearance.
 */
export function groupBySymbol(
  observations: readonly PriceObservation[],
): Map<string, PriceObservation[]> {
  const groups = new Map<string, PriceObservation[]>();
  for (const observation of observations) {
    const group = groups.get(observation.symbol);
    if (group) {
      group.push(observation);
    } else {
      groups.set(observation.symbol, [observation]);
    }
  }
  return groups;
}

export function normalizeGroup(
  symbol: string,
  observations: readonly PriceObservation[],
  options: StatsOptions = {},
): RankingEntry {
  const min = minPrice(observations);
  const max = maxPrice(observations);
  return {
    symbol,
    normalizedValue: normalizedRange(min, max, { logger: options.logger }),
    minPrice: min,
    maxPrice: max,
  };
}

/**
 * One entry per symbol, sorted by normalized value descending. Exact ties
 * keep first-appearance order (Array#sort is stable).
 */
export function rankBySymbol(
  observations: readonly PriceObservation[],
  options: StatsOptions = {},
): RankingEntry[] {
  const entries = Array.from(groupBySymbol(observations), ([symbol, group]) =>
    normalizeGroup(symbol, group, options),
  );

  entries.sort((a, b) => b.normalizedValue.comparedTo(a.normalizedValue));

  options.logger?.debug(
    { symbols: entries.length, observations: observations.length },
    "ranked symbols by normalized range",
  );
  return entries;
}
