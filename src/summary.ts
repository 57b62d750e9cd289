// Series summary — pure aggregation over a normalized PriceSeries.

import type { PricePoint, PriceSeries } from "./domain.ts";

export interface SeriesSummary {
  readonly first: PricePoint;
  readonly last: PricePoint;
  readonly change: number;
  readonly changePercent: number;
  readonly high: number;
  readonly low: number;
  readonly volume: number;
  readonly bars: number;
}

/** Undefined for an empty series. */
export function summarize(series: PriceSeries): SeriesSummary | undefined {
  const first = series[0];
  const last = series[series.length - 1];
  if (first === undefined || last === undefined) return undefined;

  let high = first.high;
  let low = first.low;
  let volume = 0;
  for (const point of series) {
    high = Math.max(high, point.high);
    low = Math.min(low, point.low);
    volume += point.volume;
  }

  const change = last.close - first.open;
  const changePercent = first.open === 0 ? 0 : (change / first.open) * 100;

  return {
    first,
    last,
    change,
    changePercent,
    high,
    low,
    volume,
    bars: series.length,
  };
}
