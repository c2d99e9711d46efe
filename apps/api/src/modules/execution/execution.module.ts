import { Module } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { StoreModule } from "../store/store.module";
import { TRADE_STORE, type TradeStore } from "../store/trade-store";
import { createExecutionPort } from "./execution.factory";
import { EXECUTION_PORT } from "./execution.port";

@Module({
  imports: [StoreModule],
  providers: [
    {
      provide: EXECUTION_PORT,
      inject: [ConfigService, TRADE_STORE],
      useFactory: async (config: ConfigService, store: TradeStore) => await createExecutionPort(config.load(), store)
    }
  ],
  exports: [EXECUTION_PORT]
})
export class ExecutionModule {}
