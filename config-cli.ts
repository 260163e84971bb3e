/**
 * Configuration CLI for the sandwich options bot
 * Inspect and edit config.json from the command line
 */

import minimist from "minimist";
import { readFileSync } from "node:fs";
import { copyFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { ExpiryCalendar, classifyMonth } from "./calendar.ts";
import {
  ConfigManager,
  createDefaultConfig,
  mergeWithDefaults,
  validateConfig,
  type BotConfig,
  type SandwichParameters,
  type StrategySettings,
} from "./config.ts";
import { describeError } from "./logger.ts";

type ParsedArgs = minimist.ParsedArgs;

interface CLICommand {
  name: string;
  description: string;
  handler: (args: ParsedArgs) => Promise<void>;
}

function configPath(args: ParsedArgs): string {
  return typeof args.config === "string" ? args.config : "./config.json";
}

function numberFlag(args: ParsedArgs, name: string): number | undefined {
  const raw: unknown = args[name];
  if (raw === undefined || raw === null || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`--${name} must be a number, got "${String(raw)}"`);
  }
  return value;
}

/** Collects the sandwich/strategy fields named on the command line. */
export function parseParameterUpdates(args: ParsedArgs): {
  sandwich: Partial<SandwichParameters>;
  strategy: Partial<StrategySettings>;
} {
  const sandwich: Partial<SandwichParameters> = {};
  const strategy: Partial<StrategySettings> = {};
  const defaults = createDefaultConfig().sandwich;

  const profitTarget = numberFlag(args, "profitTarget");
  if (profitTarget !== undefined) {
    // accept 12 as well as 0.12
    sandwich.profitTargetPct = profitTarget > 1 ? profitTarget / 100 : profitTarget;
  }
  const hedgeOffset = numberFlag(args, "hedgeOffset");
  if (hedgeOffset !== undefined) sandwich.hedgeOffset = hedgeOffset;
  const callOffset = numberFlag(args, "callOffset");
  if (callOffset !== undefined) sandwich.callOffset = callOffset;

  const breadShort = numberFlag(args, "breadShort");
  const breadLong = numberFlag(args, "breadLong");
  if (breadShort !== undefined || breadLong !== undefined) {
    sandwich.breadDistance = {
      SHORT: breadShort ?? defaults.breadDistance.SHORT,
      LONG: breadLong ?? defaults.breadDistance.LONG,
    };
  }
  const rallyShort = numberFlag(args, "rallyShort");
  const rallyLong = numberFlag(args, "rallyLong");
  if (rallyShort !== undefined || rallyLong !== undefined) {
    sandwich.rallyThreshold = {
      SHORT: rallyShort ?? defaults.rallyThreshold.SHORT,
      LONG: rallyLong ?? defaults.rallyThreshold.LONG,
    };
  }

  const capital = numberFlag(args, "capital");
  if (capital !== undefined) strategy.capital = capital;
  const lotSize = numberFlag(args, "lotSize");
  if (lotSize !== undefined) strategy.lotSize = lotSize;

  return { sandwich, strategy };
}

function readRawConfig(path: string): BotConfig {
  return mergeWithDefaults(JSON.parse(readFileSync(path, "utf8")) as Partial<BotConfig>);
}

const commands: CLICommand[] = [
  {
    name: "show",
    description: "Print the effective configuration",
    handler: async (args) => {
      const manager = await ConfigManager.createDefault(configPath(args));
      const config = manager.getConfig();
      const { strategy, sandwich, broker } = config;

      console.log("\n📋 Sandwich Configuration:");
      console.log("=".repeat(60));
      console.log(`Broker: ${broker.name} (dry run: ${broker.dryRun}, product ${broker.product})`);
      console.log(`Underlying: ${strategy.underlying} (${strategy.spotSymbol}), lot size ${strategy.lotSize}`);
      console.log(`Capital: ${strategy.capital.toLocaleString()} pts (₹${(strategy.capital * strategy.lotSize).toLocaleString()})`);
      console.log(`Entry/exit: ${strategy.entryTime}/${strategy.exitTime} ±${strategy.timeToleranceMinutes}m ${strategy.timezone}`);
      console.log(`Profit target: ${(sandwich.profitTargetPct * 100).toFixed(1)}%`);
      console.log(`Offsets: call ${sandwich.callOffset}, hedge ${sandwich.hedgeOffset}`);
      console.log(`Bread distance: ${sandwich.breadDistance.SHORT} / ${sandwich.breadDistance.LONG}`);
      console.log(`Rally threshold: ${sandwich.rallyThreshold.SHORT} / ${sandwich.rallyThreshold.LONG}`);
      console.log(`Passive weeks: ${sandwich.passiveWeeks.SHORT} / ${sandwich.passiveWeeks.LONG}`);
      console.log(`Core put roll candidates: ${sandwich.corePutRollCandidates.join(", ")}`);
      console.log(`Market data: ${config.marketData.primarySource} (backup ${config.marketData.backupSource ?? "none"})`);
      console.log(`Notifications: ${config.notifications.enabled ? "on" : "off"}`);
    },
  },

  {
    name: "validate",
    description: "Validate the configuration file",
    handler: async (args) => {
      const errors = validateConfig(readRawConfig(configPath(args)));
      if (errors.length > 0) {
        console.error("❌ Configuration has errors:");
        errors.forEach((error) => console.error(`  - ${error}`));
        process.exitCode = 1;
        return;
      }
      console.log("✅ Configuration is valid");
    },
  },

  {
    name: "set-params",
    description: "Update strategy parameters",
    handler: async (args) => {
      const { sandwich, strategy } = parseParameterUpdates(args);
      if (Object.keys(sandwich).length === 0 && Object.keys(strategy).length === 0) {
        console.error("❌ Nothing to update; see --help for parameter flags");
        return;
      }

      const manager = await ConfigManager.createDefault(configPath(args));
      manager.updateSandwichParameters(sandwich);
      manager.updateStrategySettings(strategy);
      await manager.saveConfig();
      console.log(`✅ Updated: ${[...Object.keys(sandwich), ...Object.keys(strategy)].join(", ")}`);
    },
  },

  {
    name: "set-broker",
    description: "Choose the broker and dry-run mode",
    handler: async (args) => {
      const name: unknown = args.name;
      if (name !== "mock" && name !== "zerodha") {
        console.error("❌ Please specify --name mock|zerodha");
        return;
      }
      const manager = await ConfigManager.createDefault(configPath(args));
      manager.updateBroker({ name, dryRun: Boolean(args["dry-run"]) });
      await manager.saveConfig();
      console.log(`✅ Broker set to ${name} (dry run: ${Boolean(args["dry-run"])})`);
    },
  },

  {
    name: "expiries",
    description: "List monthly expiries for a year",
    handler: async (args) => {
      const year = numberFlag(args, "year") ?? new Date().getFullYear();
      const calendar = new ExpiryCalendar();
      const expiries = calendar.expiriesForYear(year);

      console.log(`\n📅 Monthly expiries ${year}:`);
      expiries.forEach((expiry) => {
        const next = calendar.nextMonthlyExpiry(expiry);
        console.log(`  ${expiry}  -> next ${next} (${classifyMonth(expiry, next)})`);
      });
    },
  },

  {
    name: "backup",
    description: "Copy the configuration to a backup file",
    handler: async (args) => {
      const source = configPath(args);
      const target =
        typeof args.path === "string" ? args.path : `${source}.backup-${new Date().toISOString().replace(/[:.]/g, "-")}`;
      await copyFile(source, target);
      console.log(`✅ Configuration backed up to ${target}`);
    },
  },
];

function showHelp(): void {
  console.log(`
🤖 Sandwich Options Bot Configuration CLI

Usage: tsx config-cli.ts <command> [options]

Commands:
${commands.map((cmd) => `  ${cmd.name.padEnd(15)} ${cmd.description}`).join("\n")}

Examples:
  # Show the configuration
  tsx config-cli.ts show

  # Raise the profit target and widen the short-month bread
  tsx config-cli.ts set-params --profitTarget 15 --breadShort 2200

  # Switch to live Zerodha trading
  tsx config-cli.ts set-broker --name zerodha

  # List expiries
  tsx config-cli.ts expiries --year 2025

Common Options:
  --config <path>        Config file (default ./config.json)
  --profitTarget <n>     Profit target, percent or fraction
  --hedgeOffset <n>      Hedge offset in points
  --callOffset <n>       Core call/put offset in points
  --breadShort <n>       Bread distance, short month
  --breadLong <n>        Bread distance, long month
  --rallyShort <n>       Rally threshold, short month
  --rallyLong <n>        Rally threshold, long month
  --capital <n>          Capital in index points x lots
  --lotSize <n>          Lot size
`);
}

async function main(): Promise<void> {
  const args = minimist(process.argv.slice(2), {
    string: ["config", "name", "path"],
    boolean: ["help", "dry-run"],
    alias: { h: "help", c: "config" },
  });

  if (args.help || args._.length === 0) {
    showHelp();
    return;
  }

  const commandName = String(args._[0]);
  const command = commands.find((cmd) => cmd.name === commandName);

  if (!command) {
    console.error(`❌ Unknown command: ${commandName}`);
    console.error("Run with --help to see available commands");
    return;
  }

  try {
    await command.handler(args);
  } catch (error) {
    console.error(`❌ Error executing command: ${describeError(error)}`);
    process.exit(1);
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  await main();
}
