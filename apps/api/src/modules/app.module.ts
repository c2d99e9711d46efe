import { type DynamicModule, Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";
import type { Logger } from "pino";

import { AdvisoryModule } from "./advisory/advisory.module";
import { BacktestModule } from "./backtest/backtest.module";
import { ConfigService } from "./config/config.service";
import { EngineModule } from "./engine/engine.module";
import { HealthModule } from "./health/health.module";
import { LOGGER } from "./logging/pino-logger";
import { ApiKeyGuard } from "./security/api-key.guard";

@Module({})
export class AppModule {
  /** The configuration is loaded and validated before Nest starts, so both come in ready-made. */
  static forRoot(options: { configService: ConfigService; logger: Logger }): DynamicModule {
    return {
      module: AppModule,
      global: true,
      imports: [HealthModule, AdvisoryModule, EngineModule, BacktestModule],
      providers: [
        { provide: ConfigService, useValue: options.configService },
        { provide: LOGGER, useValue: options.logger },
        { provide: APP_GUARD, useClass: ApiKeyGuard }
      ],
      exports: [ConfigService, LOGGER]
    };
  }
}
