/**
 * Health check endpoint for Docker containers
 */

import "dotenv/config";
import { existsSync } from "node:fs";
import { createServer } from "node:http";
import { pathToFileURL } from "node:url";
import { tradingDay } from "./calendar.ts";
import { ConfigManager } from "./config.ts";
import { TradeJournal } from "./journal.ts";
import { Logger, describeError, runMain } from "./logger.ts";

export interface HealthResponse {
  status: number;
  body: unknown;
}

export interface HealthContext {
  journal: TradeJournal;
  dataDir: string;
  logFile: string;
  timezone: string;
}

export async function handleRequest(
  pathname: string,
  ctx: HealthContext,
  now: Date = new Date(),
): Promise<HealthResponse> {
  if (pathname === "/health") {
    return {
      status: 200,
      body: {
        timestamp: now.toISOString(),
        status: "healthy",
        checks: {
          data_dir: existsSync(ctx.dataDir),
          log_file: existsSync(ctx.logFile),
        },
      },
    };
  }

  try {
    if (pathname === "/status") {
      const status = await ctx.journal.readStatus();
      return status === null
        ? { status: 200, body: { status: null, message: "No strategy cycle yet" } }
        : { status: 200, body: status };
    }

    if (pathname === "/trades") {
      const today = tradingDay(now, ctx.timezone);
      const trades = await ctx.journal.readTrades(today);
      return trades.length > 0
        ? { status: 200, body: trades }
        : { status: 200, body: { trades: [], message: `No trades on ${today}` } };
    }
  } catch (error) {
    return { status: 500, body: { error: describeError(error) } };
  }

  return { status: 404, body: { error: "Not Found" } };
}

async function main(): Promise<void> {
  const config = (await ConfigManager.createDefault()).getConfig();
  const ctx: HealthContext = {
    journal: new TradeJournal(
      config.logging.dataDir,
      config.logging.enableTradeLogging,
      Logger.silent(),
      config.strategy.timezone,
    ),
    dataDir: config.logging.dataDir,
    logFile: config.logging.logFile,
    timezone: config.strategy.timezone,
  };
  const port = Number(process.env.HEALTH_PORT ?? 8080);

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    handleRequest(url.pathname, ctx)
      .then(({ status, body }) => {
        res.writeHead(status, { "Content-Type": "application/json" });
        res.end(JSON.stringify(body, null, 2));
      })
      .catch((error: unknown) => {
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: describeError(error) }));
      });
  });

  server.listen(port, () => {
    console.log(`Health check server running on http://localhost:${port}`);
  });
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  await runMain(main);
}
