// Pure domain types — no framework dependency, no I/O.

export const INTERVALS = ["1min", "5min", "15min", "30min", "60min"] as const;

export type Interval = (typeof INTERVALS)[number];

export interface QueryParameters {
  readonly symbol: string;
  readonly interval: Interval;
  readonly month?: string; // YYYY-MM
  readonly apiKey: string;
}

/** Decoded provider JSON, before any shape checks. */
export type RawPayload = Readonly<Record<string, unknown>>;

export interface PricePoint {
  readonly timestamp: Date;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/** Strictly ascending by timestamp. */
export type PriceSeries = ReadonlyArray<PricePoint>;
