import { Decimal } from "decimal.js";
import {
  RANKING_SCALE,
  REPORTING_SCALE,
  type StatsOptions,
} from "./types.ts";

// Wide enough that the division never rounds before the final scale does.
const Ratio = Decimal.clone({ precision: 50, rounding: Decimal.ROUND_HALF_UP });

export interface NormalizedRangeOptions extends StatsOptions {
  scale?: number;
}

/**
 * `(max - min) / min`, rounded half-up to `scale` fractional digits
 * (defaults to {@link RANKING_SCALE}). A zero minimum yields zero.
 */
export function normalizedRange(
  minPrice: Decimal,
  maxPrice: Decimal,
  options: NormalizedRangeOptions = {},
): Decimal {
  const scale = options.scale ?? RANKING_SCALE;

  if (!minPrice.gt(0)) {
    options.logger?.warn(
      { minPrice: minPrice.toFixed(), maxPrice: maxPrice.toFixed() },
      "normalized range degenerate: min price is zero",
    );
    return new Decimal(0);
  }

  return new Ratio(maxPrice)
    .minus(minPrice)
    .div(minPrice)
    .toDecimalPlaces(scale, Decimal.ROUND_HALF_UP);
}

export function toReportingScale(value: Decimal): string {
  return value.toFixed(REPORTING_SCALE, Decimal.ROUND_HALF_UP);
}
