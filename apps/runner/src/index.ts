import "dotenv/config";
import {
  ConfigurationError,
  LogNotifier,
  createLogger,
  errorMessage,
  readTradingConfigFromEnv,
  type TradingConfig
} from "@hedgegrid/core";
import { TradingSession } from "@hedgegrid/engine";
import { ExchangeRegistry, PaperExchange, PaperMarketFeed } from "@hedgegrid/exchange";
import { createHealthServer, getRunnerHealth } from "./health.js";

const log = createLogger("runner");

const PAPER_VENUES = ["paper", "paper-hedge"];

type PaperVenue = {
  exchange: PaperExchange;
  feed: PaperMarketFeed;
  instrument: string;
};

function readPort(): number {
  const port = Number(process.env.HEALTH_PORT ?? "8091");
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ConfigurationError(`HEALTH_PORT must be a port number (got "${process.env.HEALTH_PORT}")`, [
      "HEALTH_PORT: invalid port"
    ]);
  }
  return port;
}

/** Only paper venues ship with the runner; live adapters register here the same way. */
function buildRegistry(config: TradingConfig, paper: Map<string, PaperVenue>): ExchangeRegistry {
  const startPrice = Number(process.env.PAPER_START_PRICE ?? "50000");
  const registry = new ExchangeRegistry();

  PAPER_VENUES.forEach((name, index) => {
    registry.register(name, (venue) => {
      const exchange = new PaperExchange(venue, { initialCash: Number(process.env.PAPER_INITIAL_CASH ?? "10000") });
      const instrument = venue === config.exchange ? config.instrument : config.hedge.instrument ?? config.instrument;
      const feed = new PaperMarketFeed({ startPrice, tickSize: config.tickSize, seed: index + 1 });
      const quote = feed.current();
      exchange.setMarket(instrument, quote.bid, quote.ask);
      paper.set(venue, { exchange, feed, instrument });
      return exchange;
    });
  });
  return registry;
}

async function main() {
  const config = readTradingConfigFromEnv();
  const port = readPort();
  const paper = new Map<string, PaperVenue>();
  const registry = buildRegistry(config, paper);

  const primary = registry.getOrCreate(config.exchange);
  const hedge = config.hedge.enabled && config.hedge.exchange ? registry.getOrCreate(config.hedge.exchange) : null;

  const session = new TradingSession({
    config,
    primary,
    hedge,
    notifier: new LogNotifier(log.child({ component: "notifier" })),
    log: createLogger("session", { venue: primary.venue, instrument: config.instrument })
  });

  const feedTimer = setInterval(() => {
    for (const venue of paper.values()) {
      const quote = venue.feed.step();
      venue.exchange.setMarket(venue.instrument, quote.bid, quote.ask);
    }
  }, config.tickIntervalMs);

  const startedAt = Date.now();
  const server = createHealthServer(() => getRunnerHealth(session.getStatus(), startedAt));
  server.listen(port, "0.0.0.0", () => {
    log.info({ port }, "runner health server listening");
  });

  const shutdown = async (reason: string) => {
    clearInterval(feedTimer);
    server.close();
    await registry.closeAll();
    log.info({ reason }, "runner stopped");
  };

  const requestStop = (signal: string) => {
    log.info({ signal }, "runner shutdown requested");
    session.stop(signal).catch((error: unknown) => {
      log.error({ err: errorMessage(error), signal }, "session stop failed");
    });
  };
  process.once("SIGTERM", () => requestStop("SIGTERM"));
  process.once("SIGINT", () => requestStop("SIGINT"));

  session.start();
  const outcome = await session.done;
  await shutdown(outcome.reason);
  if (outcome.state === "failed") process.exitCode = 1;
}

main().catch((error) => {
  if (error instanceof ConfigurationError) {
    log.error({ issues: error.issues }, error.message);
  } else {
    log.error({ err: errorMessage(error) }, "runner crashed");
  }
  process.exit(1);
});
