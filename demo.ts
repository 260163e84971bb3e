/**
 * Sandwich Strategy Demo
 * Walks one cycle through every defensive stage on the simulated market,
 * without a broker connection.
 */

import { pathToFileURL } from "node:url";
import { ExpiryCalendar, atExchangeTime } from "./calendar.ts";
import { ConfigManager } from "./config.ts";
import { Logger, runMain } from "./logger.ts";
import { SimulatedMarket } from "./market-data.ts";
import { MockBroker } from "./mock-broker.ts";
import { LogNotifier } from "./notifications.ts";
import { SandwichStrategy } from "./sandwich.ts";

interface DemoStep {
  day: string;
  spot: number;
  label: string;
}

// entry on the October 2025 expiry, exit on the November one
const ENTRY_DAY = "2025-10-28";
const STEPS: DemoStep[] = [
  { day: "2025-11-03", spot: 45400, label: "quiet first week" },
  { day: "2025-11-10", spot: 46000, label: "still inside the passive window" },
  { day: "2025-11-12", spot: 46700, label: "rally after two weeks" },
  { day: "2025-11-14", spot: 46900, label: "too soon for the second defense" },
  { day: "2025-11-17", spot: 47400, label: "spot well above the shifted puts" },
  { day: "2025-11-24", spot: 47600, label: "expiry-week Monday above the outer call" },
  { day: "2025-11-25", spot: 47500, label: "next expiry at the exit time" },
];

async function main(): Promise<void> {
  console.log("=== Sandwich Strategy Demo ===\n");

  const configManager = await ConfigManager.createDefault();
  const config = configManager.getConfig();
  const { strategy: settings, sandwich } = config;
  const logger = new Logger("demo", { level: "INFO" });

  console.log("Sandwich Configuration:");
  console.log(`  Underlying: ${settings.underlying}, lot size ${settings.lotSize}, capital ${settings.capital.toLocaleString()} pts`);
  console.log(`  Profit Target: ${sandwich.profitTargetPct * 100}%`);
  console.log(`  Bread Distance: short ${sandwich.breadDistance.SHORT} / long ${sandwich.breadDistance.LONG}`);
  console.log(`  Rally Threshold: short ${sandwich.rallyThreshold.SHORT} / long ${sandwich.rallyThreshold.LONG}\n`);

  const calendar = new ExpiryCalendar();
  let now = atExchangeTime(ENTRY_DAY, settings.entryTime, settings.timezone);
  const market = new SimulatedMarket(calendar, config.marketData.simulated, settings.spotSymbol, settings.timezone, now);
  const broker = new MockBroker(market);
  await broker.connect();

  const strategy = new SandwichStrategy({
    settings,
    params: sandwich,
    prices: market,
    broker,
    calendar,
    logger: logger.child("strategy"),
    notifier: new LogNotifier(logger.child("notify")),
  });

  const entered = await strategy.enter({}, now);
  if (!entered) {
    console.log("Entry did not happen; check the configuration");
    return;
  }

  for (const step of STEPS) {
    now = atExchangeTime(step.day, settings.exitTime, settings.timezone);
    market.setSpot(step.spot, now);
    await strategy.monitor(now);

    const m = strategy.getMetrics(now);
    console.log(`\n${step.day} spot ${step.spot} (${step.label})`);
    console.log(`  State: ${m.state}  Open legs: ${m.openLegCount}  Closed legs: ${m.closedLegCount}`);
    console.log(`  Open P&L: ${m.totalPnl}  Realized: ${m.realizedPnl}  Net: ${m.netPnl} (${m.netPnlPct}%)`);
    if (m.state === "CLOSED") break;
  }

  console.log("\n=== Demo Complete ===");
  console.log("Open legs at the end:");
  for (const leg of strategy.getOpenLegs()) {
    console.log(`  ${leg.direction} ${leg.quantity}x ${leg.instrument} [${leg.role}]`);
  }
  const final = strategy.getMetrics(now);
  console.log(`Final state: ${final.state} (${final.exitReason ?? "open"})`);
  console.log(`Net P&L: ${final.netPnl} pts = ₹${(final.netPnl * settings.lotSize).toLocaleString()}`);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  await runMain(main);
}
