// Intraday API — service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { PriceSeries, QueryParameters } from "./domain.ts";

// --- Errors ---

export type FetchFailureReason = "Transport" | "Timeout" | "Status" | "Decode";

/** The request never produced a usable JSON object. */
export class FetchError extends Data.TaggedError("FetchError")<{
  readonly reason: FetchFailureReason;
  readonly message: string;
  readonly status?: number;
}> {}

/** The payload arrived but is not a valid intraday time series. */
export class FormatError extends Data.TaggedError("FormatError")<{
  readonly message: string;
  readonly timestamp?: string;
  readonly field?: string;
}> {}

export class QueryError extends Data.TaggedError("QueryError")<{
  readonly message: string;
}> {}

export type IntradayApiError = FetchError | FormatError | QueryError;

// --- Retry classification ---

/** Only transport faults may succeed on a second attempt; a FormatError
 *  reproduces deterministically. */
export function isRetryable(e: IntradayApiError): boolean {
  if (e._tag !== "FetchError") return false;
  switch (e.reason) {
    case "Transport":
    case "Timeout":
      return true;
    case "Status":
      return e.status !== undefined && (e.status >= 500 || e.status === 429);
    case "Decode":
      return false;
  }
}

// --- Service ---

export class IntradayApi extends Context.Tag("IntradayApi")<
  IntradayApi,
  {
    readonly getSeries: (
      params: QueryParameters,
    ) => Effect.Effect<PriceSeries, IntradayApiError>;
  }
>() {}
