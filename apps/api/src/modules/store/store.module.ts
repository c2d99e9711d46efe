import path from "node:path";

import { Module } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { JsonFileTradeStore } from "./json-file-trade-store";
import { TRADE_STORE } from "./trade-store";

@Module({
  providers: [
    {
      provide: TRADE_STORE,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => new JsonFileTradeStore(path.join(config.dataDir, "trades.json"))
    }
  ],
  exports: [TRADE_STORE]
})
export class StoreModule {}
