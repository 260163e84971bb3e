/**
 * main.ts
 *
 * Sandwich options bot for BANKNIFTY monthly expiries.
 *
 * Quick start:
 *   cp .env.example .env      # DRY_RUN=true uses the mock broker
 *   npm run expiries          # show the current cycle
 *   npm start -- --force      # one entry attempt, skipping the calendar gate
 *   npm run schedule          # run the scheduler until Ctrl+C
 *
 * Live trading needs BROKER=zerodha, DRY_RUN=false, KITE_API_KEY and a
 * fresh KITE_ACCESS_TOKEN.
 */

import "dotenv/config";
import minimist from "minimist";
import { pathToFileURL } from "node:url";
import { classifyMonth, tradingDay } from "./calendar.ts";
import { ConfigManager } from "./config.ts";
import { createLogger, describeError, runMain } from "./logger.ts";
import { createRuntime } from "./runtime.ts";
import { StrategyScheduler } from "./scheduler.ts";

const HELP = `
Sandwich options bot

Usage: tsx main.ts [options]

Options:
  --execute          Attempt one entry now
  --force            With --execute: skip the expiry-day/entry-time gate
  --schedule         Run the scheduler until SIGINT/SIGTERM
  --expiries         Print current/next expiry and month type
  --config <path>    Config file (default ./config.json)
  --dry-run          Force the mock broker
  --help             Show this help message
`;

async function main(): Promise<void> {
  const flags = minimist(process.argv.slice(2), {
    string: ["config"],
    boolean: ["execute", "force", "schedule", "expiries", "dry-run", "help"],
    default: { config: "./config.json" },
  });

  if (flags.help || (!flags.execute && !flags.schedule && !flags.expiries)) {
    console.log(HELP);
    return;
  }

  const configPath = typeof flags.config === "string" ? flags.config : "./config.json";
  const configManager = await ConfigManager.createDefault(configPath);
  if (flags["dry-run"]) {
    configManager.updateBroker({ dryRun: true });
  }
  const config = configManager.getConfig();
  const logger = createLogger(config.logging, "bot");

  try {
    const runtime = await createRuntime(config, logger);
    const now = new Date();

    if (flags.expiries) {
      const today = tradingDay(now, config.strategy.timezone);
      const current = runtime.calendar.currentExpiry(today);
      const next = runtime.calendar.nextMonthlyExpiry(current);
      const upcoming = runtime.calendar.upcomingExpiry(today);
      logger.info(`Today: ${today} (expiry day: ${runtime.calendar.isExpiryDay(today)})`);
      logger.info(`Current expiry: ${current}, next expiry: ${next}`);
      logger.info(`Month type: ${classifyMonth(current, next, config.sandwich.longMonthGapDays)}`);
      logger.info(`Next entry opportunity: ${upcoming}`);
    }

    if (flags.execute) {
      logger.info(`Broker: ${runtime.broker.name} (dry run: ${config.broker.dryRun})`);
      const strategy = runtime.createStrategy();
      const entered = await strategy.enter({ force: Boolean(flags.force) }, now);
      if (entered) {
        await runtime.journal.writeStatus(strategy.getMetrics(now), now);
        for (const leg of strategy.getOpenLegs()) {
          logger.info(`  ${leg.direction} ${leg.quantity}x ${leg.instrument} @ ${leg.entryPrice} [${leg.role}]`);
        }
      } else {
        logger.info("No position entered");
      }
    }

    if (flags.schedule) {
      const scheduler = new StrategyScheduler(runtime);
      scheduler.start();

      await new Promise<void>((resolve) => {
        const shutdown = (signal: string) => {
          logger.info(`Received ${signal}, shutting down`);
          scheduler.stop();
          resolve();
        };
        process.once("SIGINT", () => shutdown("SIGINT"));
        process.once("SIGTERM", () => shutdown("SIGTERM"));
      });
    }

    await runtime.broker.disconnect();
    logger.info("Bot execution completed successfully");
  } catch (e) {
    logger.error("Fatal error:", describeError(e));
    process.exit(1);
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  await runMain(main);
}
