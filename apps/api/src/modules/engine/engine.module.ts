import { Module } from "@nestjs/common";
import type { Logger } from "pino";

import { AdvisoryModule } from "../advisory/advisory.module";
import { AdvisoryService } from "../advisory/advisory.service";
import { ConfigService } from "../config/config.service";
import { ExecutionModule } from "../execution/execution.module";
import { EXECUTION_PORT, type ExecutionPort } from "../execution/execution.port";
import { LOGGER } from "../logging/pino-logger";
import { MarketDataModule } from "../market-data/market-data.module";
import { MARKET_DATA, type MarketDataPort } from "../market-data/market-data.port";
import { StoreModule } from "../store/store.module";
import { TRADE_STORE, type TradeStore } from "../store/trade-store";
import { DecisionEngineService } from "./decision-engine.service";
import { EngineController } from "./engine.controller";

@Module({
  imports: [AdvisoryModule, ExecutionModule, MarketDataModule, StoreModule],
  controllers: [EngineController],
  providers: [
    {
      provide: DecisionEngineService,
      inject: [ConfigService, MARKET_DATA, EXECUTION_PORT, TRADE_STORE, AdvisoryService, LOGGER],
      useFactory: (config: ConfigService, marketData: MarketDataPort, execution: ExecutionPort, store: TradeStore, advisory: AdvisoryService, logger: Logger) =>
        new DecisionEngineService({ config: config.load(), marketData, execution, store, advisory, logger: logger.child({ component: "engine" }) })
    }
  ],
  exports: [DecisionEngineService]
})
export class EngineModule {}
