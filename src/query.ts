// Query parameters — validation of caller input before any request is built.

import { Config, Effect, Option, Schema } from "effect";
import { INTERVALS, type QueryParameters } from "./domain.ts";
import { QueryError } from "./intraday-api.ts";

const QueryInput = Schema.Struct({
  symbol: Schema.String,
  interval: Schema.Literal(...INTERVALS),
  month: Schema.optional(Schema.String),
  apiKey: Schema.String,
});

const MONTH = /^\d{4}-(0[1-9]|1[0-2])$/;

/** Decode raw caller input into immutable QueryParameters. Symbol and API key
 *  are trimmed and must be non-empty; an empty month means "latest". */
export function makeQueryParameters(
  input: unknown,
): Effect.Effect<QueryParameters, QueryError> {
  return Schema.decodeUnknown(QueryInput)(input).pipe(
    Effect.mapError(
      (e) => new QueryError({ message: `Invalid query: ${e.message}` }),
    ),
    Effect.flatMap(({ symbol, interval, month, apiKey }) => {
      const trimmedSymbol = symbol.trim();
      const trimmedKey = apiKey.trim();
      const trimmedMonth = month?.trim() ?? "";

      if (trimmedSymbol.length === 0) {
        return Effect.fail(new QueryError({ message: "Symbol cannot be empty" }));
      }
      if (trimmedKey.length === 0) {
        return Effect.fail(new QueryError({ message: "API key cannot be empty" }));
      }
      if (trimmedMonth.length > 0 && !MONTH.test(trimmedMonth)) {
        return Effect.fail(
          new QueryError({
            message: `Month must be formatted as YYYY-MM, got '${trimmedMonth}'`,
          }),
        );
      }

      const params: QueryParameters = {
        symbol: trimmedSymbol,
        interval,
        apiKey: trimmedKey,
        ...(trimmedMonth.length > 0 ? { month: trimmedMonth } : {}),
      };
      return Effect.succeed(params);
    }),
  );
}

// --- API key ---

/** Placeholder key for the offline sample provider, which never sends it. */
export const SAMPLE_API_KEY = "sample";

/** An explicit key wins; otherwise the sample provider needs none and the
 *  live provider reads ALPHA_VANTAGE_API_KEY. */
export function resolveApiKey(
  flag: Option.Option<string>,
  provider: string,
): Effect.Effect<string, QueryError> {
  return Effect.gen(function* () {
    if (Option.isSome(flag)) return flag.value;
    if (provider === "sample") return SAMPLE_API_KEY;
    return yield* Config.string("ALPHA_VANTAGE_API_KEY");
  }).pipe(
    Effect.mapError(
      () =>
        new QueryError({
          message: "Missing API key: pass --api-key or set ALPHA_VANTAGE_API_KEY",
        }),
    ),
  );
}
