// Alpha Vantage — normalization of a TIME_SERIES_INTRADAY payload into a
// PriceSeries. Pure: no I/O, no logging.

import { Effect, Predicate } from "effect";
import type { PricePoint, PriceSeries, RawPayload } from "../domain.ts";
import { FormatError } from "../intraday-api.ts";

// --- Wire format ---

const FIELDS = {
  open: "1. open",
  high: "2. high",
  low: "3. low",
  close: "4. close",
  volume: "5. volume",
} as const;

type PriceField = "open" | "high" | "low" | "close";

/** Notices Alpha Vantage sends instead of data (rate limit, premium-only). */
const NOTICE_KEYS = ["Note", "Information"] as const;

const TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

export function timeSeriesKey(interval: string): string {
  return `Time Series (${interval})`;
}

// --- Normalize ---

export function normalizeIntraday(
  payload: RawPayload,
  interval: string,
): Effect.Effect<PriceSeries, FormatError> {
  if ("Error Message" in payload) {
    return Effect.fail(
      new FormatError({ message: providerMessage(payload["Error Message"]) }),
    );
  }

  const key = timeSeriesKey(interval);
  const block = payload[key];

  if (block === undefined) {
    const notice = NOTICE_KEYS.find((k) => k in payload);
    return Effect.fail(
      new FormatError({
        message:
          notice !== undefined
            ? `Invalid data format. Missing '${key}' key: ${providerMessage(payload[notice])}`
            : `Invalid data format. Missing '${key}' key.`,
        field: key,
      }),
    );
  }

  if (!Predicate.isRecord(block)) {
    return Effect.fail(
      new FormatError({
        message: `Invalid data format. '${key}' is not an object.`,
        field: key,
      }),
    );
  }

  return Effect.forEach(Object.entries(block), ([timestamp, entry]) =>
    toPricePoint(timestamp, entry),
  ).pipe(
    Effect.map((points) =>
      points.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime()),
    ),
  );
}

function providerMessage(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

// --- Entries ---

function toPricePoint(
  timestamp: string,
  entry: unknown,
): Effect.Effect<PricePoint, FormatError> {
  return Effect.gen(function* () {
    const date = yield* parseTimestamp(timestamp);

    if (!Predicate.isRecord(entry)) {
      return yield* Effect.fail(
        new FormatError({
          message: `Entry at ${timestamp} is not an object`,
          timestamp,
        }),
      );
    }

    const open = yield* parsePrice(entry, timestamp, "open");
    const high = yield* parsePrice(entry, timestamp, "high");
    const low = yield* parsePrice(entry, timestamp, "low");
    const close = yield* parsePrice(entry, timestamp, "close");
    const volume = yield* parseVolume(entry, timestamp);

    if (high < low) {
      return yield* Effect.fail(
        new FormatError({
          message: `'${FIELDS.high}' (${high}) is below '${FIELDS.low}' (${low}) at ${timestamp}`,
          timestamp,
          field: FIELDS.high,
        }),
      );
    }

    return { timestamp: date, open, high, low, close, volume };
  });
}

/** Timestamps carry no zone; they are read as UTC wall-clock time. */
function parseTimestamp(timestamp: string): Effect.Effect<Date, FormatError> {
  const fail = Effect.fail(
    new FormatError({
      message: `Invalid timestamp '${timestamp}', expected YYYY-MM-DD HH:MM:SS`,
      timestamp,
      field: "timestamp",
    }),
  );

  const match = TIMESTAMP.exec(timestamp);
  if (match === null) return fail;

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  // Out-of-range parts roll over (Feb 30 -> Mar 2); reject those.
  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;

  return roundTrips ? Effect.succeed(date) : fail;
}

function rawField(
  entry: Record<string, unknown>,
  timestamp: string,
  field: string,
): Effect.Effect<string, FormatError> {
  const value = entry[field];
  if (typeof value === "string") return Effect.succeed(value.trim());
  if (typeof value === "number") return Effect.succeed(String(value));

  return Effect.fail(
    new FormatError({
      message:
        value === undefined
          ? `Missing '${field}' at ${timestamp}`
          : `Invalid '${field}' at ${timestamp}: ${JSON.stringify(value)}`,
      timestamp,
      field,
    }),
  );
}

function parsePrice(
  entry: Record<string, unknown>,
  timestamp: string,
  name: PriceField,
): Effect.Effect<number, FormatError> {
  const field = FIELDS[name];
  return rawField(entry, timestamp, field).pipe(
    Effect.flatMap((raw) => {
      const value = Number(raw);
      if (!DECIMAL.test(raw) || !Number.isFinite(value)) {
        return Effect.fail(
          new FormatError({
            message: `Invalid '${field}' at ${timestamp}: ${JSON.stringify(raw)}`,
            timestamp,
            field,
          }),
        );
      }
      if (value < 0) {
        return Effect.fail(
          new FormatError({
            message: `Negative '${field}' at ${timestamp}: ${raw}`,
            timestamp,
            field,
          }),
        );
      }
      // "-0" parses to -0, which passes the sign check.
      return Effect.succeed(value + 0);
    }),
  );
}

function parseVolume(
  entry: Record<string, unknown>,
  timestamp: string,
): Effect.Effect<number, FormatError> {
  const field = FIELDS.volume;
  return rawField(entry, timestamp, field).pipe(
    Effect.flatMap((raw) => {
      const value = Number(raw);
      if (!INTEGER.test(raw) || !Number.isSafeInteger(value)) {
        return Effect.fail(
          new FormatError({
            message: `Invalid '${field}' at ${timestamp}: ${JSON.stringify(raw)}`,
            timestamp,
            field,
          }),
        );
      }
      if (value < 0) {
        return Effect.fail(
          new FormatError({
            message: `Negative '${field}' at ${timestamp}: ${raw}`,
            timestamp,
            field,
          }),
        );
      }
      // "-0" parses to -0, which passes the sign check.
      return Effect.succeed(value + 0);
    }),
  );
}
