import { Decimal } from "decimal.js";
import { groupBySymbol, normalizeGroup } from "./ranking.ts";
import {
  type DayRangeResult,
  type DayWindow,
  INVALID_DATE_MESSAGE,
  type PriceObservation,
  type PriceStore,
  type RankingEntry,
  type StatsOptions,
} from "./types.ts";

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

// 23:59:59, inclusive
const DAY_END_OFFSET_MS = ((23 * 60 + 59) * 60 + 59) * 1000;

/**
 * Strict `yyyy-MM-dd`, interpreted as a UTC calendar day. Returns undefined
 * for any other shape and for dates that do not exist (2022-02-30).
 */
export function resolveDayWindow(dateString: string): DayWindow | undefined {
  const match = ISO_DAY.exec(dateString);
  if (!match) {
    return undefined;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // setUTCFullYear keeps years 0-99 literal
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }

  const start = date.getTime();
  return { date: dateString, start, end: start + DAY_END_OFFSET_MS };
}

/**
 * The symbol with the largest normalized range. The first group seen wins a
 * tie, so this always agrees with the head of `rankBySymbol`.
 */
export function highestRangeIn(
  observations: readonly PriceObservation[],
  options: StatsOptions = {},
): RankingEntry | undefined {
  let best: RankingEntry | undefined;
  for (const [symbol, group] of groupBySymbol(observations)) {
    const entry = normalizeGroup(symbol, group, options);
    if (best === undefined || entry.normalizedValue.gt(best.normalizedValue)) {
      best = entry;
    }
  }
  return best;
}

export function highestRangeForDay(
  store: Pick<PriceStore, "findByTimestampRange">,
  dateString: string,
  options: StatsOptions = {},
): DayRangeResult {
  const window = resolveDayWindow(dateString);
  if (!window) {
    return { status: "invalid-input", date: dateString, message: INVALID_DATE_MESSAGE };
  }

  const observations = store.findByTimestampRange(window.start, window.end);
  const best = highestRangeIn(observations, options);
  if (!best) {
    options.logger?.debug({ date: dateString }, "no observations for day");
    return {
      status: "not-found",
      date: dateString,
      symbol: "",
      normalizedValue: new Decimal(0),
    };
  }

  return { status: "found", date: dateString, ...best };
}
