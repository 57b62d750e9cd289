// Alpha Vantage — implementation of IntradayApi.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Layer, Predicate } from "effect";
import type { QueryParameters, RawPayload } from "../domain.ts";
import { FetchError, IntradayApi, QueryError } from "../intraday-api.ts";
import { normalizeIntraday } from "./alpha-vantage-normalize.ts";

export const DEFAULT_BASE_URL = "https://www.alphavantage.co/query";

export const REQUEST_TIMEOUT = "10 seconds";

// --- Request builder ---

export interface IntradayRequest {
  readonly url: string;
  readonly params: ReadonlyArray<readonly [string, string]>;
}

/** Symbol and month are forwarded verbatim; the provider validates them. */
export function buildIntradayRequest(
  params: QueryParameters,
  baseUrl: string = DEFAULT_BASE_URL,
): IntradayRequest {
  const query: Array<readonly [string, string]> = [
    ["function", "TIME_SERIES_INTRADAY"],
    ["symbol", params.symbol],
    ["interval", params.interval],
    ["adjusted", "true"],
    ["outputsize", "full"],
    ["apikey", params.apiKey],
  ];

  if (params.month !== undefined && params.month.length > 0) {
    query.push(["month", params.month]);
  }

  return { url: baseUrl, params: query };
}

// --- Fetcher ---

export interface FetchOptions {
  readonly baseUrl?: string;
}

/** One GET, no retry. Every transport outcome other than a 2xx JSON object
 *  becomes a FetchError; the payload itself is returned unchecked. Empty
 *  symbol or API key fails with QueryError before any request is made. */
export function fetchIntraday(
  params: QueryParameters,
  options: FetchOptions = {},
): Effect.Effect<RawPayload, FetchError | QueryError, HttpClient.HttpClient> {
  if (params.symbol.length === 0) {
    return Effect.fail(new QueryError({ message: "Symbol cannot be empty" }));
  }
  if (params.apiKey.length === 0) {
    return Effect.fail(new QueryError({ message: "API key cannot be empty" }));
  }

  const { url, params: urlParams } = buildIntradayRequest(
    params,
    options.baseUrl,
  );

  return Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
    );

    yield* Effect.logDebug("requesting intraday series");
    const response = yield* client.execute(
      HttpClientRequest.get(url).pipe(HttpClientRequest.setUrlParams(urlParams)),
    );
    const json = yield* response.json;

    if (!Predicate.isRecord(json)) {
      return yield* Effect.fail(
        new FetchError({
          reason: "Decode",
          message: "Response body is not a JSON object",
        }),
      );
    }

    yield* Effect.logDebug(`received payload with keys: ${Object.keys(json).join(", ")}`);
    return json;
  }).pipe(
    // The response body is released when the call completes.
    Effect.scoped,
    Effect.catchTags({
      RequestError: (e) =>
        Effect.fail(new FetchError({ reason: "Transport", message: e.message })),
      ResponseError: (e) =>
        e.reason === "StatusCode"
          ? Effect.fail(
              new FetchError({
                reason: "Status",
                message: `HTTP ${e.response.status}`,
                status: e.response.status,
              }),
            )
          : Effect.fail(
              new FetchError({
                reason: "Decode",
                message: `JSON parse failed: ${e.message}`,
              }),
            ),
    }),
    Effect.timeoutFail({
      duration: REQUEST_TIMEOUT,
      onTimeout: () =>
        new FetchError({
          reason: "Timeout",
          message: `Request timed out after ${REQUEST_TIMEOUT}`,
        }),
    }),
    Effect.tapError((e) => Effect.logDebug(`fetch failed: ${e.reason}`)),
    Effect.annotateLogs({ symbol: params.symbol, interval: params.interval }),
    Effect.withLogSpan("alpha-vantage.fetch"),
  );
}

// --- Alpha Vantage layer ---

export const AlphaVantageLive = Layer.effect(
  IntradayApi,
  Effect.gen(function* () {
    const client = yield* HttpClient.HttpClient;
    const baseUrl = yield* Config.string("ALPHA_VANTAGE_BASE_URL").pipe(
      Config.withDefault(DEFAULT_BASE_URL),
    );

    return IntradayApi.of({
      getSeries: (params: QueryParameters) =>
        fetchIntraday(params, { baseUrl }).pipe(
          Effect.flatMap((payload) =>
            normalizeIntraday(payload, params.interval),
          ),
          Effect.provideService(HttpClient.HttpClient, client),
        ),
    });
  }),
);
