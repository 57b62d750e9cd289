import { expect, test } from "vitest";
import { summarize } from "./summary.ts";
import type { PricePoint } from "./domain.ts";

const point = (
  time: string,
  open: number,
  high: number,
  low: number,
  close: number,
  volume: number,
): PricePoint => ({
  timestamp: new Date(`${time}Z`),
  open,
  high,
  low,
  close,
  volume,
});

test("summarize: empty series has no summary", () => {
  expect(summarize([])).toBeUndefined();
});

test("summarize: aggregates range, change and volume", () => {
  const series = [
    point("2024-01-05T15:50:00", 100, 102, 99, 101, 10),
    point("2024-01-05T15:55:00", 101, 104, 100, 103, 20),
    point("2024-01-05T16:00:00", 103, 103.5, 98, 105, 30),
  ];

  const summary = summarize(series);

  expect(summary?.first).toBe(series[0]);
  expect(summary?.last).toBe(series[2]);
  expect(summary?.change).toBe(5);
  expect(summary?.changePercent).toBe(5);
  expect(summary?.high).toBe(104);
  expect(summary?.low).toBe(98);
  expect(summary?.volume).toBe(60);
  expect(summary?.bars).toBe(3);
});

test("summarize: zero opening price gives zero percent change", () => {
  const summary = summarize([point("2024-01-05T15:50:00", 0, 1, 0, 1, 5)]);
  expect(summary?.change).toBe(1);
  expect(summary?.changePercent).toBe(0);
});
