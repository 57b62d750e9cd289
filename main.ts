import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  Console,
  Effect,
  Layer,
  Logger,
  LogLevel,
  Option,
  Schedule,
} from "effect";
import { INTERVALS } from "./src/domain.ts";
import {
  IntradayApi,
  isRetryable,
  type IntradayApiError,
} from "./src/intraday-api.ts";
import { makeQueryParameters, resolveApiKey } from "./src/query.ts";
import { AlphaVantageLive } from "./src/providers/alpha-vantage.ts";
import { IntradayApiSampleLive } from "./src/providers/intraday-sample.ts";
import { formatError, formatSeries } from "./src/format.ts";

// --- Config ---
// Set INTRADAY_PROVIDER to "alphavantage" (default) or "sample".

const ProviderConfig = Config.string("INTRADAY_PROVIDER").pipe(
  Config.withDefault("alphavantage"),
);

// --- CLI ---

const symbol = Options.text("symbol").pipe(
  Options.withDescription("Stock ticker symbol (e.g. AAPL, MSFT, IBM)"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter a stock symbol:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("Symbol cannot be empty")
          : Effect.succeed(value.trim()),
    }),
  ),
);

const apiKey = Options.text("api-key").pipe(
  Options.withDescription("Alpha Vantage API key (default: ALPHA_VANTAGE_API_KEY)"),
  Options.optional,
);

const interval = Options.choice("interval", INTERVALS).pipe(
  Options.withDescription("Bar interval"),
  Options.withDefault("1min"),
);

const month = Options.text("month").pipe(
  Options.withDescription("Month to load, formatted as YYYY-MM (default: latest)"),
  Options.optional,
);

const rows = Options.integer("rows").pipe(
  Options.withDescription("Number of most recent bars to list"),
  Options.withDefault(10),
);

const retries = Options.integer("retries").pipe(
  Options.withDescription("Retries for network and server errors"),
  Options.withDefault(2),
);

const verbose = Options.boolean("verbose").pipe(
  Options.withDescription("Log requests at debug level"),
);

const command = Command.make(
  "intraday",
  { symbol, apiKey, interval, month, rows, retries, verbose },
).pipe(
  Command.withHandler((args) =>
    Effect.gen(function* () {
      const provider = yield* ProviderConfig;
      const params = yield* makeQueryParameters({
        symbol: args.symbol,
        apiKey: yield* resolveApiKey(args.apiKey, provider),
        interval: args.interval,
        month: Option.getOrUndefined(args.month),
      });
      const api = yield* IntradayApi;
      const series = yield* api.getSeries(params).pipe(
        Effect.retry({
          while: isRetryable,
          schedule: Schedule.exponential("1 second").pipe(
            Schedule.compose(Schedule.recurs(Math.max(0, args.retries))),
          ),
        }),
      );
      yield* Console.log(
        formatSeries(params.symbol, params.interval, series, { rows: args.rows }),
      );
    }).pipe(
      Logger.withMinimumLogLevel(args.verbose ? LogLevel.Debug : LogLevel.Info),
    )
  ),
);

// --- Layers ---

const IntradayApiLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* ProviderConfig;
    return provider === "sample" ? IntradayApiSampleLive : AlphaVantageLive;
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "intraday",
  version: "0.1.0",
});

const logError = (e: IntradayApiError) =>
  Console.error(formatError(e)).pipe(
    Effect.zipRight(Effect.sync(() => {
      process.exitCode = 1;
    })),
  );

cli(process.argv).pipe(
  Effect.catchTags({
    FetchError: logError,
    FormatError: logError,
    QueryError: logError,
  }),
  Effect.provide(IntradayApiLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
