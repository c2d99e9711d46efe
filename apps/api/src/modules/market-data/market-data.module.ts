import { Module } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { BinanceClient, resolveFuturesBaseUrl } from "./binance-client";
import { BinanceMarketDataService } from "./binance-market-data.service";
import { MARKET_DATA } from "./market-data.port";

@Module({
  providers: [
    {
      provide: MARKET_DATA,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const { exchange } = config.load();
        return new BinanceMarketDataService(new BinanceClient({ baseUrl: resolveFuturesBaseUrl(exchange) }));
      }
    }
  ],
  exports: [MARKET_DATA]
})
export class MarketDataModule {}
