/**
 * Configuration management for the sandwich options bot
 * JSON file + environment overrides, validated on load
 */

import { existsSync, readFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import type { MonthType } from "./calendar.ts";
import { parseClock } from "./calendar.ts";
import { describeError, isLogLevel, type LogLevel } from "./logger.ts";

// ---- Type Definitions ------------------------------------------------------
export type BrokerName = "mock" | "zerodha";
export type PriceSourceName = "broker" | "simulated";

export interface BrokerConfig {
  name: BrokerName;
  dryRun: boolean;
  apiKey: string;
  apiSecret: string;
  accessToken: string;
  product: "NRML" | "MIS";
  /** Mock broker only: max fractional slippage applied to fills. */
  slippagePct: number;
  seed: number;
}

export interface StrategySettings {
  underlying: string;
  spotSymbol: string;
  /** Margin per cycle in index points x lots, the unit P&L is measured in (x lotSize for rupees). */
  capital: number;
  lotSize: number;
  strikeStep: number;
  timezone: string;
  entryTime: string;
  exitTime: string;
  timeToleranceMinutes: number;
}

export interface SandwichParameters {
  profitTargetPct: number;
  callOffset: number;
  hedgeOffset: number;
  breadDistance: Record<MonthType, number>;
  rallyThreshold: Record<MonthType, number>;
  passiveWeeks: Record<MonthType, number>;
  corePutRollCandidates: number[];
  secondaryPutShift: number;
  stage2WaitDays: number;
  stage2Buffer: number;
  straddleWindowDays: number;
  longMonthGapDays: number;
  /** Fraction of capital; a net loss at or beyond it raises a risk alert. */
  lossAlertPct: number;
}

export interface SimulatedMarketConfig {
  spot: number;
  /** Carry per 30 days as a fraction of spot. */
  futureCarryPct: number;
  /** At-the-money premium with 30 days left, in points. */
  timeValue: number;
  /** Distance from the money over which time value falls off. */
  moneynessScale: number;
}

export interface MarketDataConfig {
  primarySource: PriceSourceName;
  backupSource: PriceSourceName | null;
  cacheTtlSeconds: number;
  simulated: SimulatedMarketConfig;
}

export interface ScheduleConfig {
  monitorCron: string;
  marketOpen: string;
  marketClose: string;
  summaryTime: string;
}

export interface NotificationConfig {
  enabled: boolean;
  telegram: {
    enabled: boolean;
    botToken: string;
    chatId: string;
  };
  email: EmailConfig;
}

export interface EmailConfig {
  enabled: boolean;
  smtpHost: string;
  /** 465 connects over TLS; other ports upgrade with STARTTLS. */
  smtpPort: number;
  username: string;
  password: string;
  /** Defaults to the username. */
  from: string;
  to: string[];
}

export interface LoggingConfig {
  level: LogLevel;
  dataDir: string;
  logFile: string;
  enableTradeLogging: boolean;
}

export interface BotConfig {
  broker: BrokerConfig;
  strategy: StrategySettings;
  sandwich: SandwichParameters;
  marketData: MarketDataConfig;
  schedule: ScheduleConfig;
  notifications: NotificationConfig;
  logging: LoggingConfig;
}

// ---- Defaults --------------------------------------------------------------
export function createDefaultConfig(): BotConfig {
  return {
    broker: {
      name: "mock",
      dryRun: true,
      apiKey: "",
      apiSecret: "",
      accessToken: "",
      product: "NRML",
      slippagePct: 0,
      seed: 42,
    },
    strategy: {
      underlying: "BANKNIFTY",
      spotSymbol: "NSE:NIFTY BANK",
      capital: 4_000,
      lotSize: 35,
      strikeStep: 100,
      timezone: "Asia/Kolkata",
      entryTime: "15:00",
      exitTime: "15:00",
      timeToleranceMinutes: 5,
    },
    sandwich: {
      profitTargetPct: 0.12,
      callOffset: 500,
      hedgeOffset: 500,
      breadDistance: { SHORT: 2000, LONG: 2500 },
      rallyThreshold: { SHORT: 1500, LONG: 2000 },
      passiveWeeks: { SHORT: 2, LONG: 3 },
      corePutRollCandidates: [400, 500, 600],
      secondaryPutShift: 1000,
      stage2WaitDays: 4,
      stage2Buffer: 250,
      straddleWindowDays: 4,
      longMonthGapDays: 28,
      lossAlertPct: 0.05,
    },
    marketData: {
      primarySource: "broker",
      backupSource: "simulated",
      cacheTtlSeconds: 5,
      simulated: {
        spot: 45000,
        futureCarryPct: 0.002,
        timeValue: 400,
        moneynessScale: 1500,
      },
    },
    schedule: {
      monitorCron: "*/5 9-15 * * 1-5",
      marketOpen: "09:15",
      marketClose: "15:30",
      summaryTime: "15:35",
    },
    notifications: {
      enabled: false,
      telegram: { enabled: false, botToken: "", chatId: "" },
      email: {
        enabled: false,
        smtpHost: "smtp.gmail.com",
        smtpPort: 587,
        username: "",
        password: "",
        from: "",
        to: [],
      },
    },
    logging: {
      level: "INFO",
      dataDir: "./data",
      logFile: "./data/trading.log",
      enableTradeLogging: true,
    },
  };
}

/** Fills sections missing from a partial file with defaults, one level deep. */
export function mergeWithDefaults(partial: Partial<BotConfig>): BotConfig {
  const defaults = createDefaultConfig();
  return {
    broker: { ...defaults.broker, ...partial.broker },
    strategy: { ...defaults.strategy, ...partial.strategy },
    sandwich: { ...defaults.sandwich, ...partial.sandwich },
    marketData: {
      ...defaults.marketData,
      ...partial.marketData,
      simulated: { ...defaults.marketData.simulated, ...partial.marketData?.simulated },
    },
    schedule: { ...defaults.schedule, ...partial.schedule },
    notifications: {
      ...defaults.notifications,
      ...partial.notifications,
      telegram: { ...defaults.notifications.telegram, ...partial.notifications?.telegram },
      email: { ...defaults.notifications.email, ...partial.notifications?.email },
    },
    logging: { ...defaults.logging, ...partial.logging },
  };
}

const isPositive = (value: number): boolean => Number.isFinite(value) && value > 0;
const isNonNegative = (value: number): boolean => Number.isFinite(value) && value >= 0;

export function validateConfig(config: BotConfig): string[] {
  const errors: string[] = [];
  const { broker, strategy, sandwich, logging, schedule } = config;

  if (broker.name !== "mock" && broker.name !== "zerodha") {
    errors.push(`Unsupported broker: ${broker.name}`);
  }
  if (broker.name === "zerodha" && !broker.dryRun && (!broker.apiKey || !broker.accessToken)) {
    errors.push("Zerodha live trading requires apiKey and accessToken");
  }
  if (!isNonNegative(broker.slippagePct) || broker.slippagePct >= 1) {
    errors.push("broker.slippagePct must be in [0, 1)");
  }

  if (!isPositive(strategy.capital)) errors.push("strategy.capital must be positive");
  if (!Number.isInteger(strategy.lotSize) || strategy.lotSize <= 0) {
    errors.push("strategy.lotSize must be a positive integer");
  }
  if (!isPositive(strategy.strikeStep)) errors.push("strategy.strikeStep must be positive");
  if (!isNonNegative(strategy.timeToleranceMinutes)) {
    errors.push("strategy.timeToleranceMinutes must not be negative");
  }

  for (const [name, value] of [
    ["strategy.entryTime", strategy.entryTime],
    ["strategy.exitTime", strategy.exitTime],
    ["schedule.marketOpen", schedule.marketOpen],
    ["schedule.marketClose", schedule.marketClose],
    ["schedule.summaryTime", schedule.summaryTime],
  ]) {
    try {
      parseClock(value);
    } catch {
      errors.push(`${name} must be HH:MM, got "${value}"`);
    }
  }

  if (!isPositive(sandwich.profitTargetPct) || sandwich.profitTargetPct > 1) {
    errors.push("sandwich.profitTargetPct must be in (0, 1]");
  }
  if (!isPositive(sandwich.lossAlertPct) || sandwich.lossAlertPct > 1) {
    errors.push("sandwich.lossAlertPct must be in (0, 1]");
  }
  for (const [name, value] of [
    ["callOffset", sandwich.callOffset],
    ["hedgeOffset", sandwich.hedgeOffset],
    ["secondaryPutShift", sandwich.secondaryPutShift],
    ["stage2Buffer", sandwich.stage2Buffer],
  ] as const) {
    if (!isPositive(value)) errors.push(`sandwich.${name} must be positive`);
  }
  for (const [name, value] of [
    ["stage2WaitDays", sandwich.stage2WaitDays],
    ["straddleWindowDays", sandwich.straddleWindowDays],
    ["longMonthGapDays", sandwich.longMonthGapDays],
  ] as const) {
    if (!isNonNegative(value)) errors.push(`sandwich.${name} must not be negative`);
  }
  for (const monthType of ["SHORT", "LONG"] as const) {
    const bread = sandwich.breadDistance[monthType];
    if (!isPositive(bread) || bread <= sandwich.hedgeOffset) {
      errors.push(`sandwich.breadDistance.${monthType} must exceed hedgeOffset`);
    }
    if (!isPositive(sandwich.rallyThreshold[monthType])) {
      errors.push(`sandwich.rallyThreshold.${monthType} must be positive`);
    }
    if (!isNonNegative(sandwich.passiveWeeks[monthType])) {
      errors.push(`sandwich.passiveWeeks.${monthType} must not be negative`);
    }
  }
  if (sandwich.corePutRollCandidates.length === 0) {
    errors.push("sandwich.corePutRollCandidates must not be empty");
  } else if (!sandwich.corePutRollCandidates.every(Number.isFinite)) {
    errors.push("sandwich.corePutRollCandidates must be numbers");
  }

  const { email } = config.notifications;
  if (!Number.isInteger(email.smtpPort) || email.smtpPort <= 0) {
    errors.push("notifications.email.smtpPort must be a positive integer");
  }

  if (!isLogLevel(logging.level)) errors.push(`Invalid log level: ${logging.level}`);

  return errors;
}

// ---- Configuration Manager -------------------------------------------------
export class ConfigManager {
  private config: BotConfig;
  private configPath: string;

  constructor(configPath = "./config.json", env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = this.loadConfig();
    this.applyEnvironmentOverrides(env);
    this.validate();
  }

  private loadConfig(): BotConfig {
    try {
      if (!existsSync(this.configPath)) {
        throw new Error(`Config file not found: ${this.configPath}`);
      }

      const configText = readFileSync(this.configPath, "utf8");
      const config = mergeWithDefaults(JSON.parse(configText) as Partial<BotConfig>);

      console.log(`✓ Loaded configuration from ${this.configPath}`);
      return config;
    } catch (error) {
      console.error(`Failed to load config: ${describeError(error)}`);
      throw error;
    }
  }

  private applyEnvironmentOverrides(env: NodeJS.ProcessEnv): void {
    const broker = env.BROKER;
    if (broker === "mock" || broker === "zerodha") {
      this.config.broker.name = broker;
    }
    if (env.DRY_RUN) {
      this.config.broker.dryRun = env.DRY_RUN.toLowerCase() === "true";
    }
    if (env.KITE_API_KEY) this.config.broker.apiKey = env.KITE_API_KEY;
    if (env.KITE_API_SECRET) this.config.broker.apiSecret = env.KITE_API_SECRET;
    if (env.KITE_ACCESS_TOKEN) this.config.broker.accessToken = env.KITE_ACCESS_TOKEN;

    if (env.CAPITAL) this.config.strategy.capital = Number(env.CAPITAL);
    if (env.LOT_SIZE) this.config.strategy.lotSize = Number(env.LOT_SIZE);

    if (env.DATA_DIR) this.config.logging.dataDir = env.DATA_DIR;
    if (env.LOG_FILE) this.config.logging.logFile = env.LOG_FILE;
    const level = env.LOG_LEVEL?.toUpperCase();
    if (level && isLogLevel(level)) this.config.logging.level = level;

    if (env.TELEGRAM_BOT_TOKEN) this.config.notifications.telegram.botToken = env.TELEGRAM_BOT_TOKEN;
    if (env.TELEGRAM_CHAT_ID) this.config.notifications.telegram.chatId = env.TELEGRAM_CHAT_ID;
    if (env.SMTP_USERNAME) this.config.notifications.email.username = env.SMTP_USERNAME;
    if (env.SMTP_PASSWORD) this.config.notifications.email.password = env.SMTP_PASSWORD;
    if (env.EMAIL_TO) {
      this.config.notifications.email.to = env.EMAIL_TO.split(",")
        .map((address) => address.trim())
        .filter((address) => address.length > 0);
    }
  }

  private validate(config: BotConfig = this.config): void {
    const errors = validateConfig(config);
    if (errors.length > 0) {
      console.error("Configuration validation errors:");
      errors.forEach((error) => console.error(`  - ${error}`));
      throw new Error(`Configuration validation failed: ${errors.length} errors`);
    }
  }

  // ---- Getters ----
  getConfig(): BotConfig {
    return this.config;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getBrokerConfig(): BrokerConfig {
    return this.config.broker;
  }

  getStrategySettings(): StrategySettings {
    return this.config.strategy;
  }

  getSandwichParameters(): SandwichParameters {
    return this.config.sandwich;
  }

  getMarketDataConfig(): MarketDataConfig {
    return this.config.marketData;
  }

  getScheduleConfig(): ScheduleConfig {
    return this.config.schedule;
  }

  getNotificationConfig(): NotificationConfig {
    return this.config.notifications;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  // ---- Dynamic Configuration Updates ----
  async saveConfig(path = this.configPath): Promise<void> {
    try {
      await writeFile(path, JSON.stringify(this.config, null, 2));
      console.log(`✓ Configuration saved to ${path}`);
    } catch (error) {
      console.error(`Failed to save config: ${describeError(error)}`);
      throw error;
    }
  }

  updateSandwichParameters(parameters: Partial<SandwichParameters>): void {
    this.apply({ ...this.config, sandwich: { ...this.config.sandwich, ...parameters } });
  }

  updateStrategySettings(settings: Partial<StrategySettings>): void {
    this.apply({ ...this.config, strategy: { ...this.config.strategy, ...settings } });
  }

  updateBroker(settings: Partial<BrokerConfig>): void {
    this.apply({ ...this.config, broker: { ...this.config.broker, ...settings } });
  }

  /** Swaps in `next` only if it validates. */
  private apply(next: BotConfig): void {
    this.validate(next);
    this.config = next;
  }

  // ---- Factory Methods ----
  static async createDefault(configPath = "./config.json"): Promise<ConfigManager> {
    if (!existsSync(configPath)) {
      console.log(`Creating default configuration at ${configPath}`);
      await ConfigManager.generateDefaultConfig(configPath);
    }
    return new ConfigManager(configPath);
  }

  static async generateDefaultConfig(outputPath = "./config.json"): Promise<void> {
    await writeFile(outputPath, JSON.stringify(createDefaultConfig(), null, 2));
    console.log(`✓ Default configuration generated at ${outputPath}`);
  }
}
