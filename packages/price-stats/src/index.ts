export { maxPrice, minPrice, newest, oldest, summarize } from "./aggregate.ts";
export {
  highestRangeForDay,
  highestRangeIn,
  resolveDayWindow,
} from "./day-window.ts";
export {
  normalizedRange,
  toReportingScale,
  type NormalizedRangeOptions,
} from "./normalized-range.ts";
export { rankedBySymbol, statsFor } from "./queries.ts";
export { groupBySymbol, normalizeGroup, rankBySymbol } from "./ranking.ts";
export {
  INVALID_DATE_MESSAGE,
  RANKING_SCALE,
  REPORTING_SCALE,
  type DayRangeResult,
  type DayWindow,
  type PriceObservation,
  type PriceStore,
  type RankingEntry,
  type StatsLogger,
  type StatsOptions,
  type SymbolStats,
  type SymbolStatsResult,
} from "./types.ts";
