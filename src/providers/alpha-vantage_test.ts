import { expect, test, vi, type Mock } from "vitest";
import { FetchHttpClient } from "@effect/platform";
import {
  ConfigProvider,
  Effect,
  Either,
  Exit,
  Fiber,
  TestClock,
  TestContext,
} from "effect";
import {
  AlphaVantageLive,
  DEFAULT_BASE_URL,
  buildIntradayRequest,
  fetchIntraday,
} from "./alpha-vantage.ts";
import type { PriceSeries, QueryParameters, RawPayload } from "../domain.ts";
import {
  IntradayApi,
  type FetchError,
  type IntradayApiError,
  type QueryError,
} from "../intraday-api.ts";

// --- Test data ---

const query: QueryParameters = {
  symbol: "IBM",
  interval: "5min",
  apiKey: "test-key",
};

const validPayload = {
  "Meta Data": { "2. Symbol": "IBM" },
  "Time Series (5min)": {
    "2024-01-05 16:00:00": {
      "1. open": "160.10",
      "2. high": "160.50",
      "3. low": "159.90",
      "4. close": "160.20",
      "5. volume": "5000",
    },
    "2024-01-05 15:55:00": {
      "1. open": "159.80",
      "2. high": "160.20",
      "3. low": "159.70",
      "4. close": "160.10",
      "5. volume": "4000",
    },
  },
};

// --- Helpers ---

type FetchMock = Mock<typeof fetch>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function respondWith(response: () => Response): FetchMock {
  return vi.fn<typeof fetch>(async () => response());
}

function requestedUrl(mock: FetchMock): URL {
  const input = mock.mock.calls[0]?.[0];
  if (input === undefined) throw new Error("fetch was not called");
  return new URL(input instanceof Request ? input.url : input);
}

function runFetch(
  fetchMock: FetchMock,
  params: QueryParameters = query,
): Promise<Either.Either<RawPayload, FetchError | QueryError>> {
  return Effect.runPromise(
    fetchIntraday(params).pipe(
      Effect.either,
      Effect.provide(FetchHttpClient.layer),
      Effect.provideService(FetchHttpClient.Fetch, fetchMock),
    ),
  );
}

async function fetchFailure(fetchMock: FetchMock): Promise<FetchError> {
  const result = await runFetch(fetchMock);
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  if (result.left._tag !== "FetchError")
    throw new Error(`Expected FetchError, got: ${result.left._tag}`);
  return result.left;
}

function runGetSeries(
  fetchMock: FetchMock,
  config: Map<string, string> = new Map(),
): Promise<Either.Either<PriceSeries, IntradayApiError>> {
  return Effect.runPromise(
    Effect.gen(function* () {
      const api = yield* IntradayApi;
      return yield* Effect.either(api.getSeries(query));
    }).pipe(
      Effect.provide(AlphaVantageLive),
      Effect.provide(FetchHttpClient.layer),
      Effect.provideService(FetchHttpClient.Fetch, fetchMock),
      Effect.withConfigProvider(ConfigProvider.fromMap(config)),
    ),
  );
}

// --- buildIntradayRequest ---

test("buildIntradayRequest: targets the intraday function with fixed options", () => {
  const request = buildIntradayRequest(query);

  expect(request.url).toBe(DEFAULT_BASE_URL);
  expect(request.params).toEqual([
    ["function", "TIME_SERIES_INTRADAY"],
    ["symbol", "IBM"],
    ["interval", "5min"],
    ["adjusted", "true"],
    ["outputsize", "full"],
    ["apikey", "test-key"],
  ]);
});

test("buildIntradayRequest: month is appended verbatim when present", () => {
  const request = buildIntradayRequest({ ...query, month: "2023-06" });
  expect(request.params[request.params.length - 1]).toEqual(["month", "2023-06"]);
});

test("buildIntradayRequest: empty month is left out", () => {
  const request = buildIntradayRequest({ ...query, month: "" });
  expect(request.params.some(([name]) => name === "month")).toBe(false);
});

test("buildIntradayRequest: symbol is forwarded as-is", () => {
  const request = buildIntradayRequest({ ...query, symbol: "brk.b " });
  expect(request.params[1]).toEqual(["symbol", "brk.b "]);
});

test("buildIntradayRequest: base URL can be overridden", () => {
  const request = buildIntradayRequest(query, "http://localhost:8080/query");
  expect(request.url).toBe("http://localhost:8080/query");
});

// --- fetchIntraday ---

test("fetchIntraday: returns the decoded body unmodified", async () => {
  const fetchMock = respondWith(() => jsonResponse(validPayload));
  const result = await runFetch(fetchMock);

  expect(Either.isRight(result)).toBe(true);
  if (Either.isRight(result)) {
    expect(result.right).toEqual(validPayload);
  }
  expect(fetchMock).toHaveBeenCalledTimes(1);
});

test("fetchIntraday: sends the query parameters to the endpoint", async () => {
  const fetchMock = respondWith(() => jsonResponse(validPayload));
  await runFetch(fetchMock, { ...query, month: "2024-01" });

  const url = requestedUrl(fetchMock);
  expect(`${url.origin}${url.pathname}`).toBe(DEFAULT_BASE_URL);
  expect(url.searchParams.get("function")).toBe("TIME_SERIES_INTRADAY");
  expect(url.searchParams.get("symbol")).toBe("IBM");
  expect(url.searchParams.get("interval")).toBe("5min");
  expect(url.searchParams.get("adjusted")).toBe("true");
  expect(url.searchParams.get("outputsize")).toBe("full");
  expect(url.searchParams.get("apikey")).toBe("test-key");
  expect(url.searchParams.get("month")).toBe("2024-01");
});

test("fetchIntraday: provider error payload is returned, not interpreted", async () => {
  const fetchMock = respondWith(() => jsonResponse({ "Error Message": "Invalid API call" }));
  const result = await runFetch(fetchMock);

  expect(Either.isRight(result)).toBe(true);
  if (Either.isRight(result)) {
    expect(result.right).toEqual({ "Error Message": "Invalid API call" });
  }
});

test("fetchIntraday: response body is consumed without a caller-provided Scope", async () => {
  const fetchMock = respondWith(() => jsonResponse({ "Time Series (5min)": {} }));
  const exit = await Effect.runPromiseExit(
    fetchIntraday(query).pipe(
      Effect.provide(FetchHttpClient.layer),
      Effect.provideService(FetchHttpClient.Fetch, fetchMock),
    ),
  );

  expect(Exit.isSuccess(exit)).toBe(true);
  if (Exit.isSuccess(exit)) {
    expect(exit.value).toEqual({ "Time Series (5min)": {} });
  }
});

test("fetchIntraday: empty symbol fails before any request", async () => {
  const fetchMock = respondWith(() => jsonResponse(validPayload));
  const result = await runFetch(fetchMock, { ...query, symbol: "" });

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left._tag).toBe("QueryError");
    expect(result.left.message).toBe("Symbol cannot be empty");
  }
  expect(fetchMock).not.toHaveBeenCalled();
});

test("fetchIntraday: empty API key fails before any request", async () => {
  const fetchMock = respondWith(() => jsonResponse(validPayload));
  const result = await runFetch(fetchMock, { ...query, apiKey: "" });

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left._tag).toBe("QueryError");
    expect(result.left.message).toBe("API key cannot be empty");
  }
  expect(fetchMock).not.toHaveBeenCalled();
});

test("fetchIntraday: connection failure returns Transport FetchError", async () => {
  const fetchMock = vi.fn<typeof fetch>(async () => {
    throw new TypeError("fetch failed");
  });
  const error = await fetchFailure(fetchMock);

  expect(error._tag).toBe("FetchError");
  expect(error.reason).toBe("Transport");
  expect(fetchMock).toHaveBeenCalledTimes(1);
});

test("fetchIntraday: non-success status returns Status FetchError", async () => {
  const error = await fetchFailure(respondWith(() => jsonResponse({}, 503)));

  expect(error.reason).toBe("Status");
  expect(error.status).toBe(503);
  expect(error.message).toBe("HTTP 503");
});

test("fetchIntraday: non-JSON body returns Decode FetchError", async () => {
  const error = await fetchFailure(
    respondWith(() => new Response("<html>maintenance</html>", { status: 200 })),
  );
  expect(error.reason).toBe("Decode");
});

test("fetchIntraday: JSON that is not an object returns Decode FetchError", async () => {
  const error = await fetchFailure(respondWith(() => jsonResponse(["IBM"])));

  expect(error.reason).toBe("Decode");
  expect(error.message).toBe("Response body is not a JSON object");
});

test("fetchIntraday: request that never answers times out after 10 seconds", async () => {
  const fetchMock = vi.fn<typeof fetch>(() => new Promise<Response>(() => {}));

  const result = await Effect.runPromise(
    Effect.gen(function* () {
      const fiber = yield* Effect.fork(Effect.either(fetchIntraday(query)));
      yield* TestClock.adjust("10 seconds");
      return yield* Fiber.join(fiber);
    }).pipe(
      Effect.provide(FetchHttpClient.layer),
      Effect.provideService(FetchHttpClient.Fetch, fetchMock),
      Effect.provide(TestContext.TestContext),
    ),
  );

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left._tag).toBe("FetchError");
  }
  if (Either.isLeft(result) && result.left._tag === "FetchError") {
    expect(result.left.reason).toBe("Timeout");
    expect(result.left.message).toBe("Request timed out after 10 seconds");
  }
});

// --- AlphaVantageLive ---

test("AlphaVantageLive: getSeries returns an ascending series", async () => {
  const result = await runGetSeries(respondWith(() => jsonResponse(validPayload)));

  expect(Either.isRight(result)).toBe(true);
  if (Either.isRight(result)) {
    expect(result.right.map((p) => p.close)).toEqual([160.1, 160.2]);
    expect(result.right[0]?.timestamp.toISOString()).toBe("2024-01-05T15:55:00.000Z");
  }
});

test("AlphaVantageLive: provider error becomes FormatError", async () => {
  const result = await runGetSeries(
    respondWith(() => jsonResponse({ "Error Message": "Invalid API call" })),
  );

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left._tag).toBe("FormatError");
    expect(result.left.message).toBe("Invalid API call");
  }
});

test("AlphaVantageLive: fetch failure never reaches the normalizer", async () => {
  // The same body with a 200 status would be a FormatError.
  const result = await runGetSeries(
    respondWith(() => jsonResponse({ "Error Message": "Invalid API call" }, 500)),
  );

  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left._tag).toBe("FetchError");
  }
});

test("AlphaVantageLive: ALPHA_VANTAGE_BASE_URL overrides the endpoint", async () => {
  const fetchMock = respondWith(() => jsonResponse(validPayload));
  await runGetSeries(
    fetchMock,
    new Map([["ALPHA_VANTAGE_BASE_URL", "http://localhost:8080/query"]]),
  );

  const url = requestedUrl(fetchMock);
  expect(`${url.origin}${url.pathname}`).toBe("http://localhost:8080/query");
});
