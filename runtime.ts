/**
 * Wires config into a ready-to-run strategy: calendar, simulated market,
 * broker, price sources, notifier and journal.
 */

import { type Broker } from "./broker.ts";
import { ExpiryCalendar } from "./calendar.ts";
import type { BotConfig, PriceSourceName } from "./config.ts";
import { TradeJournal } from "./journal.ts";
import type { Logger } from "./logger.ts";
import { BrokerPriceSource, MarketDataProvider, SimulatedMarket, type NamedSource } from "./market-data.ts";
import { MockBroker, type InstrumentPricer } from "./mock-broker.ts";
import { createNotifier, type Notifier } from "./notifications.ts";
import { SandwichStrategy } from "./sandwich.ts";

export interface StrategyRuntime {
  config: BotConfig;
  calendar: ExpiryCalendar;
  market: SimulatedMarket;
  broker: Broker;
  prices: MarketDataProvider;
  notifier: Notifier;
  journal: TradeJournal;
  logger: Logger;
  createStrategy(): SandwichStrategy;
}

export async function createBroker(config: BotConfig, pricer: InstrumentPricer, logger: Logger): Promise<Broker> {
  const { broker } = config;

  if (broker.dryRun || broker.name === "mock") {
    logger.info(`Using mock broker (dry run: ${broker.dryRun})`);
    return new MockBroker(pricer, { slippagePct: broker.slippagePct, seed: broker.seed }, logger.child("mock-broker"));
  }

  if (broker.name === "zerodha") {
    // loaded on demand so dry runs never construct a Kite client
    const { ZerodhaBroker } = await import("./zerodha-broker.ts");
    logger.info("Using Zerodha broker");
    return new ZerodhaBroker(broker, logger.child("zerodha"));
  }

  throw new Error(`Unsupported broker: ${String(broker.name)}`);
}

export async function createRuntime(config: BotConfig, logger: Logger): Promise<StrategyRuntime> {
  const calendar = new ExpiryCalendar();
  const market = new SimulatedMarket(
    calendar,
    config.marketData.simulated,
    config.strategy.spotSymbol,
    config.strategy.timezone,
  );
  const broker = await createBroker(config, market, logger);
  if (!(await broker.connect())) {
    throw new Error(`Could not connect to ${broker.name} broker`);
  }

  const source = (name: PriceSourceName): NamedSource =>
    name === "broker"
      ? { name: "broker", source: new BrokerPriceSource(broker, config.strategy.underlying, config.strategy.spotSymbol) }
      : { name: "simulated", source: market };

  const { primarySource, backupSource, cacheTtlSeconds } = config.marketData;
  const prices = new MarketDataProvider(
    source(primarySource),
    backupSource && backupSource !== primarySource ? source(backupSource) : null,
    cacheTtlSeconds * 1000,
    logger.child("market-data"),
  );

  const notifier = createNotifier(config.notifications, logger.child("notify"));
  const journal = new TradeJournal(
    config.logging.dataDir,
    config.logging.enableTradeLogging,
    logger,
    config.strategy.timezone,
  );

  return {
    config,
    calendar,
    market,
    broker,
    prices,
    notifier,
    journal,
    logger,
    createStrategy: () =>
      new SandwichStrategy({
        settings: config.strategy,
        params: config.sandwich,
        prices,
        broker,
        calendar,
        logger: logger.child("strategy"),
        notifier,
        journal,
      }),
  };
}
