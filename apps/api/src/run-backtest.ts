import fs from "node:fs";
import { parseArgs } from "node:util";

import type { Bar } from "@tradewarden/shared";
import { BacktestRequestSchema, errorMessage } from "@tradewarden/shared";

import { backtestConfigFrom, runBacktest } from "./modules/backtest/backtest-simulator";
import { formatBacktestReport } from "./modules/backtest/backtest-report";
import { ConfigService } from "./modules/config/config.service";
import { createLogger } from "./modules/logging/pino-logger";
import { BinanceClient, resolveFuturesBaseUrl } from "./modules/market-data/binance-client";
import { BinanceMarketDataService } from "./modules/market-data/binance-market-data.service";

const USAGE = "Usage: run-backtest <SYMBOL> (--from 2024-01-01 --to 2024-03-01 | --bars bars.json) [--timeframe 1h] [--fee 0.04] [--balance 10000] [--json]";

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      timeframe: { type: "string" },
      from: { type: "string" },
      to: { type: "string" },
      bars: { type: "string" },
      fee: { type: "string" },
      balance: { type: "string" },
      json: { type: "boolean", default: false }
    }
  });

  const parsed = BacktestRequestSchema.safeParse({
    symbol: positionals[0],
    timeframe: values.timeframe,
    from: values.from,
    to: values.to,
    bars: values.bars ? JSON.parse(fs.readFileSync(values.bars, "utf-8")) : undefined,
    overrides: { feePercent: optionalNumber(values.fee), initialBalance: optionalNumber(values.balance) }
  });
  if (!parsed.success) {
    console.error(parsed.error.issues.map((i) => `${i.path.join(".") || "args"}: ${i.message}`).join("\n"));
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }
  const request = parsed.data;

  const configService = new ConfigService();
  const config = configService.load();
  const logger = createLogger({ dataDir: configService.dataDir, level: process.env.LOG_LEVEL ?? "warn" });

  let bars: readonly Bar[];
  if (request.bars) {
    bars = request.bars;
  } else if (request.from && request.to) {
    const marketData = new BinanceMarketDataService(new BinanceClient({ baseUrl: resolveFuturesBaseUrl(config.exchange) }));
    bars = await marketData.fetchHistory(request.symbol, request.timeframe ?? config.engine.timeframe, request.from.getTime(), request.to.getTime());
  } else {
    throw new Error("Provide either --bars or --from/--to");
  }

  const result = await runBacktest(request.symbol, bars, backtestConfigFrom(config, request.overrides), logger);
  console.log(values.json ? JSON.stringify(result, null, 2) : formatBacktestReport(result));
}

main().catch((err) => {
  console.error(errorMessage(err));
  process.exit(1);
});
