import { summarize } from "./aggregate.ts";
import { rankBySymbol } from "./ranking.ts";
import type {
  PriceStore,
  RankingEntry,
  StatsOptions,
  SymbolStatsResult,
} from "./types.ts";

export function statsFor(
  store: Pick<PriceStore, "findBySymbol">,
  symbol: string,
): SymbolStatsResult {
  const stats = summarize(symbol, store.findBySymbol(symbol));
  return stats ? { status: "found", stats } : { status: "not-found", symbol };
}

export function rankedBySymbol(
  store: Pick<PriceStore, "findAll">,
  options: StatsOptions = {},
): RankingEntry[] {
  return rankBySymbol(store.findAll(), options);
}
