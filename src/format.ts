// Pure formatting functions — no I/O.

import type { PriceSeries } from "./domain.ts";
import type { FetchError, IntradayApiError } from "./intraday-api.ts";
import { summarize } from "./summary.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Helpers ---

const pad = (n: number) => String(n).padStart(2, "0");

/** UTC wall-clock, minute precision. */
export function formatTime(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

const formatVolume = (volume: number) => volume.toLocaleString("en-US");

// --- Sparkline ---

const TICKS = "▁▂▃▄▅▆▇█";

/** Values are averaged into at most `width` buckets before scaling. */
export function sparkline(values: ReadonlyArray<number>, width = 60): string {
  if (values.length === 0) return "";

  const buckets: number[] = [];
  const size = Math.max(1, Math.ceil(values.length / width));
  for (let i = 0; i < values.length; i += size) {
    const chunk = values.slice(i, i + size);
    buckets.push(chunk.reduce((sum, v) => sum + v, 0) / chunk.length);
  }

  const min = Math.min(...buckets);
  const max = Math.max(...buckets);
  const range = max - min;

  return buckets
    .map((v) =>
      TICKS[range === 0 ? 0 : Math.round(((v - min) / range) * (TICKS.length - 1))],
    )
    .join("");
}

// --- Series formatting ---

export interface SeriesFormatOptions {
  /** Number of most recent bars to list. */
  readonly rows: number;
}

export function formatSeries(
  symbol: string,
  interval: string,
  series: PriceSeries,
  options: SeriesFormatOptions,
): string {
  const summary = summarize(series);

  if (summary === undefined) {
    return [
      "",
      `${BOLD}  ${symbol} · ${interval}${RESET}`,
      `  ${DIM}No data. The provider returned an empty series: either no trades ` +
        `occurred or the month/symbol has no intraday history.${RESET}`,
      "",
    ].join("\n");
  }

  const direction = summary.change >= 0 ? "▲" : "▼";
  const color = summary.change >= 0 ? GREEN : RED;
  const sign = summary.change >= 0 ? "+" : "";

  const header = [
    "",
    `${BOLD}  ${symbol} · ${interval}${RESET}`,
    `  ${DIM}${formatTime(summary.first.timestamp)} → ${formatTime(summary.last.timestamp)} (${summary.bars} bars)${RESET}`,
    `  ${BOLD}${summary.first.open.toFixed(2)} → ${summary.last.close.toFixed(2)}${RESET}  ` +
      `${color}${direction} ${sign}${summary.change.toFixed(2)} (${sign}${summary.changePercent.toFixed(2)}%)${RESET}`,
    `  High ${summary.high.toFixed(2)}  Low ${summary.low.toFixed(2)}  Volume ${formatVolume(summary.volume)}`,
    `  ${sparkline(series.map((p) => p.close))}`,
    "",
  ];

  return [...header, ...formatTable(series, options.rows), ""].join("\n");
}

function formatTable(series: PriceSeries, rows: number): string[] {
  const recent = rows > 0 ? series.slice(-rows) : [];
  if (recent.length === 0) return [];

  const head =
    `  ${"Time".padEnd(16)}  ${"Open".padStart(10)}  ${"High".padStart(10)}  ` +
    `${"Low".padStart(10)}  ${"Close".padStart(10)}  ${"Volume".padStart(12)}`;

  const lines = recent.map(
    (p) =>
      `  ${formatTime(p.timestamp)}  ${p.open.toFixed(2).padStart(10)}  ` +
      `${p.high.toFixed(2).padStart(10)}  ${p.low.toFixed(2).padStart(10)}  ` +
      `${p.close.toFixed(2).padStart(10)}  ${formatVolume(p.volume).padStart(12)}`,
  );

  return [`${DIM}${head}${RESET}`, ...lines];
}

// --- Error formatting ---

export function formatError(error: IntradayApiError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: IntradayApiError): ClassifiedError {
  switch (error._tag) {
    case "FetchError":
      return classifyFetchError(error);
    case "FormatError":
      // Without a field or timestamp the provider itself rejected the request.
      return error.field === undefined && error.timestamp === undefined
        ? { title: "Request rejected", hint: error.message }
        : { title: "Unexpected response", hint: error.message };
    case "QueryError":
      return { title: "Invalid input", hint: error.message };
  }
}

function classifyFetchError(error: FetchError): ClassifiedError {
  switch (error.reason) {
    case "Transport":
      return {
        title: "Network error",
        hint: "Could not reach the API. Check your internet connection.",
      };
    case "Timeout":
      return {
        title: "Request timed out",
        hint: "The provider did not answer in time. Try again in a moment.",
      };
    case "Decode":
      return {
        title: "Unexpected response",
        hint: "The API did not return a JSON object.",
      };
    case "Status":
      return classifyStatus(error.status);
  }
}

function classifyStatus(status: number | undefined): ClassifiedError {
  if (status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests — wait a moment and try again.",
    };
  }
  if (status !== undefined && status >= 500 && status < 600) {
    return {
      title: "Server error",
      hint: "Alpha Vantage is having issues. Try again in a few minutes.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${status ?? "unknown"}`,
  };
}
