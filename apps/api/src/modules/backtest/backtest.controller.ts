import { BadRequestException, Body, Controller, Inject, Post } from "@nestjs/common";
import type { AppConfig, BacktestResult, Bar } from "@tradewarden/shared";
import { BacktestRequestSchema, TradingError, assertOrderedBars, errorMessage } from "@tradewarden/shared";
import type { Logger } from "pino";

import { ConfigService } from "../config/config.service";
import { LOGGER } from "../logging/pino-logger";
import { MARKET_DATA, type MarketDataPort } from "../market-data/market-data.port";
import { backtestConfigFrom, runBacktest } from "./backtest-simulator";

@Controller("backtest")
export class BacktestController {
  private readonly config: AppConfig;

  constructor(
    @Inject(ConfigService) configService: ConfigService,
    @Inject(MARKET_DATA) private readonly marketData: MarketDataPort,
    @Inject(LOGGER) private readonly logger: Logger
  ) {
    this.config = configService.load();
  }

  @Post()
  async run(@Body() body: unknown): Promise<BacktestResult> {
    const parsed = BacktestRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues.map((i) => `${i.path.join(".") || "(body)"}: ${i.message}`).join("; "));
    }
    const request = parsed.data;
    const config = this.config;

    let bars: readonly Bar[];
    if (request.bars) {
      bars = request.bars;
    } else if (request.from && request.to) {
      bars = await this.marketData.fetchHistory(request.symbol, request.timeframe ?? config.engine.timeframe, request.from.getTime(), request.to.getTime());
    } else {
      throw new BadRequestException("Provide either bars or a from/to range");
    }

    try {
      assertOrderedBars(bars);
    } catch (err) {
      throw new BadRequestException(errorMessage(err));
    }

    try {
      return await runBacktest(request.symbol, bars, backtestConfigFrom(config, request.overrides), this.logger.child({ component: "backtest" }));
    } catch (err) {
      if (err instanceof TradingError) {
        throw new BadRequestException(err.message);
      }
      throw err;
    }
  }
}
