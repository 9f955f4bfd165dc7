import { Decimal } from "decimal.js";
import type { PriceObservation, SymbolStats } from "./types.ts";

const ZERO = new Decimal(0);

export function minPrice(observations: readonly PriceObservation[]): Decimal {
  let min: Decimal | undefined;
  for (const observation of observations) {
    if (min === undefined || observation.price.lt(min)) {
      min = observation.price;
    }
  }
  return min ?? ZERO;
}

export function maxPrice(observations: readonly PriceObservation[]): Decimal {
  let max: Decimal | undefined;
  for (const observation of observations) {
    if (max === undefined || observation.price.gt(max)) {
      max = observation.price;
    }
  }
  return max ?? ZERO;
}

export function oldest(
  observations: readonly PriceObservation[],
): PriceObservation | undefined {
  let found: PriceObservation | undefined;
  for (const observation of observations) {
    if (found === undefined || observation.timestamp < found.timestamp) {
      found = observation;
    }
  }
  return found;
}

export function newest(
  observations: readonly PriceObservation[],
): PriceObservation | undefined {
  let found: PriceObservation | undefined;
  for (const observation of observations) {
    if (found === undefined || observation.timestamp > found.timestamp) {
      found = observation;
    }
  }
  return found;
}

/**
 * Single pass over one symbol's observations. The caller is responsible for
 * handing in a homogeneous sequence; symbols are not checked.
 */
export function summarize(
  symbol: string,
  observations: readonly PriceObservation[],
): SymbolStats | undefined {
  if (observations.length === 0) {
    return undefined;
  }

  const first = observations[0];
  const stats: SymbolStats = {
    symbol,
    oldest: first,
    newest: first,
    minPrice: first.price,
    maxPrice: first.price,
  };

  for (let i = 1; i < observations.length; i++) {
    const observation = observations[i];
    if (observation.timestamp < stats.oldest.timestamp) stats.oldest = observation;
    if (observation.timestamp > stats.newest.timestamp) stats.newest = observation;
    if (observation.price.lt(stats.minPrice)) stats.minPrice = observation.price;
    if (observation.price.gt(stats.maxPrice)) stats.maxPrice = observation.price;
  }

  return stats;
}
