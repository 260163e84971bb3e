/**
 * Strategy notifications: Telegram Bot API, email over SMTP, or the log.
 * Delivery problems are logged and never reach the strategy.
 */

import axios from "axios";
import nodemailer, { type Transporter } from "nodemailer";
import type { AdjustmentStage, ExitReason } from "./adjustments.ts";
import type { MonthType } from "./calendar.ts";
import type { EmailConfig, NotificationConfig } from "./config.ts";
import type { Direction } from "./legs.ts";
import { describeError, type Logger } from "./logger.ts";
import type { StrategyMetrics } from "./metrics.ts";

const TELEGRAM_API = "https://api.telegram.org";

// ---- Events ----------------------------------------------------------------
export interface EntryLegSummary {
  instrument: string;
  direction: Direction;
  quantity: number;
  price: number;
}

export type StrategyEvent =
  | {
      type: "ENTRY";
      underlying: string;
      spot: number;
      future: number;
      monthType: MonthType;
      expiry: string;
      legs: EntryLegSummary[];
    }
  | { type: "ADJUSTMENT"; stage: AdjustmentStage; note: string; spot: number }
  | { type: "EXIT"; reason: ExitReason; netPnl: number; netPnlPct: number }
  | { type: "RISK_ALERT"; message: string; netPnlPct: number }
  | { type: "SUMMARY"; metrics: StrategyMetrics }
  | { type: "ERROR"; message: string };

export interface Notifier {
  notify(event: StrategyEvent): Promise<void>;
}

export function formatEvent(event: StrategyEvent): string {
  switch (event.type) {
    case "ENTRY": {
      const lines = event.legs.map(
        (leg) => `• ${leg.direction === "LONG" ? "BUY" : "SELL"} ${leg.quantity}x \`${leg.instrument}\` @ ${leg.price}`,
      );
      return [
        `🟢 *Sandwich entered* (${event.underlying})`,
        `Spot ${event.spot} | Future ${event.future} | ${event.monthType} month | expiry ${event.expiry}`,
        ...lines,
      ].join("\n");
    }
    case "ADJUSTMENT":
      return `🛡️ *${event.stage}* at spot ${event.spot}\n${event.note}`;
    case "EXIT": {
      const emoji = event.netPnl >= 0 ? "✅" : "🔴";
      return `${emoji} *Sandwich closed* (${event.reason})\nNet P&L: ${event.netPnl.toFixed(2)} pts (${event.netPnlPct.toFixed(2)}%)`;
    }
    case "RISK_ALERT":
      return `⚠️ *Risk alert*\n${event.message} (${event.netPnlPct.toFixed(2)}%)`;
    case "SUMMARY": {
      const m = event.metrics;
      return [
        `📊 *Daily summary* (${m.state})`,
        `Open legs: ${m.openLegCount} | Closed legs: ${m.closedLegCount}`,
        `Open P&L: ${m.totalPnl} | Realized: ${m.realizedPnl} | Net: ${m.netPnl} (${m.netPnlPct}%)`,
        `Days since entry: ${m.daysSinceEntry}`,
      ].join("\n");
    }
    case "ERROR":
      return `❌ *Error*\n${event.message}`;
  }
}

// ---- Notifiers -------------------------------------------------------------
export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async notify(event: StrategyEvent): Promise<void> {
    this.logger.info(`[${event.type}] ${formatEvent(event).replace(/\n/g, " | ")}`);
  }
}

export class TelegramNotifier implements Notifier {
  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    private readonly logger: Logger,
  ) {}

  async notify(event: StrategyEvent): Promise<void> {
    const result = await this.send(formatEvent(event));
    if (!result.ok) {
      this.logger.warn(`Telegram send failed: ${result.error}`);
    }
  }

  async send(text: string): Promise<{ ok: boolean; error?: string }> {
    try {
      await axios.post(
        `${TELEGRAM_API}/bot${this.botToken}/sendMessage`,
        {
          chat_id: this.chatId,
          text,
          parse_mode: "Markdown",
          disable_web_page_preview: true,
        },
        { timeout: 10000 },
      );
      return { ok: true };
    } catch (err) {
      const description: unknown = axios.isAxiosError(err) ? err.response?.data?.description : undefined;
      return { ok: false, error: typeof description === "string" ? description : describeError(err) };
    }
  }
}

const EMAIL_SUBJECTS: Record<StrategyEvent["type"], string> = {
  ENTRY: "Sandwich entered",
  ADJUSTMENT: "Sandwich adjusted",
  EXIT: "Sandwich closed",
  RISK_ALERT: "Sandwich risk alert",
  SUMMARY: "Sandwich daily summary",
  ERROR: "Sandwich bot error",
};

export class EmailNotifier implements Notifier {
  private readonly transporter: Transporter;

  constructor(
    private readonly config: EmailConfig,
    private readonly logger: Logger,
  ) {
    this.transporter = nodemailer.createTransport({
      host: config.smtpHost,
      port: config.smtpPort,
      secure: config.smtpPort === 465,
      auth: { user: config.username, pass: config.password },
    });
  }

  async notify(event: StrategyEvent): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.config.from || this.config.username,
        to: this.config.to.join(", "),
        subject: EMAIL_SUBJECTS[event.type],
        // plain text: drop the Markdown markers
        text: formatEvent(event).replace(/[*`]/g, ""),
      });
    } catch (error) {
      this.logger.warn(`Email send failed: ${describeError(error)}`);
    }
  }
}

/** Fans an event out to several notifiers; one failing does not stop the rest. */
export class CompositeNotifier implements Notifier {
  constructor(
    private readonly notifiers: Notifier[],
    private readonly logger: Logger,
  ) {}

  async notify(event: StrategyEvent): Promise<void> {
    for (const notifier of this.notifiers) {
      try {
        await notifier.notify(event);
      } catch (error) {
        this.logger.warn(`Notifier failed for ${event.type}: ${describeError(error)}`);
      }
    }
  }
}

export function createNotifier(config: NotificationConfig, logger: Logger): Notifier {
  const notifiers: Notifier[] = [new LogNotifier(logger)];
  const { telegram } = config;
  if (config.enabled && telegram.enabled) {
    if (telegram.botToken && telegram.chatId) {
      notifiers.push(new TelegramNotifier(telegram.botToken, telegram.chatId, logger));
    } else {
      logger.warn("Telegram enabled but bot token or chat id is missing");
    }
  }
  const { email } = config;
  if (config.enabled && email.enabled) {
    if (email.smtpHost && email.username && email.to.length > 0) {
      notifiers.push(new EmailNotifier(email, logger));
    } else {
      logger.warn("Email enabled but SMTP host, username or recipients are missing");
    }
  }
  return new CompositeNotifier(notifiers, logger);
}
