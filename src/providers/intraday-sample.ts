// Sample IntradayApi — deterministic in-memory payloads for development and
// demos. Payloads use the provider's wire format and go through the same
// normalizer as live data.

import { Effect, Layer } from "effect";
import type { Interval, QueryParameters, RawPayload } from "../domain.ts";
import { IntradayApi } from "../intraday-api.ts";
import { normalizeIntraday, timeSeriesKey } from "./alpha-vantage-normalize.ts";

// --- Sample data ---

const basePrices: Record<string, number> = {
  AAPL: 190,
  MSFT: 415,
  TSLA: 240,
};

const BARS = 48;
const DEFAULT_SESSION_END = "2024-06-14";

const INTERVAL_MINUTES: Record<Interval, number> = {
  "1min": 1,
  "5min": 5,
  "15min": 15,
  "30min": 30,
  "60min": 60,
};

const pad = (n: number) => String(n).padStart(2, "0");

function formatTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/** Build a descending-ordered block, the way the provider sends it. */
export function samplePayload(params: QueryParameters): RawPayload {
  const base = basePrices[params.symbol.toUpperCase()];

  if (base === undefined) {
    return {
      "Error Message":
        "Invalid API call. Please retry or visit the documentation for TIME_SERIES_INTRADAY.",
    };
  }

  const sessionEnd = params.month !== undefined ? `${params.month}-15` : DEFAULT_SESSION_END;
  const end = Date.parse(`${sessionEnd}T16:00:00Z`);
  const step = INTERVAL_MINUTES[params.interval] * 60_000;

  const block: Record<string, Record<string, string>> = {};
  for (let i = 0; i < BARS; i++) {
    const open = base + Math.sin(i / 4) * base * 0.01;
    const close = base + Math.sin((i + 1) / 4) * base * 0.01;
    const high = Math.max(open, close) + base * 0.002;
    const low = Math.min(open, close) - base * 0.002;
    block[formatTimestamp(new Date(end - (BARS - 1 - i) * step))] = {
      "1. open": open.toFixed(4),
      "2. high": high.toFixed(4),
      "3. low": low.toFixed(4),
      "4. close": close.toFixed(4),
      "5. volume": String(1000 + ((i * 7919) % 5000)),
    };
  }

  const descending = Object.fromEntries(Object.entries(block).reverse());
  return { [timeSeriesKey(params.interval)]: descending };
}

// --- Sample layer ---

export const IntradayApiSampleLive = Layer.succeed(
  IntradayApi,
  IntradayApi.of({
    getSeries: (params: QueryParameters) =>
      normalizeIntraday(samplePayload(params), params.interval),
  }),
);
