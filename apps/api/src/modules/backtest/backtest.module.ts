import { Module } from "@nestjs/common";

import { MarketDataModule } from "../market-data/market-data.module";
import { BacktestController } from "./backtest.controller";

@Module({
  imports: [MarketDataModule],
  controllers: [BacktestController]
})
export class BacktestModule {}
