import { Module } from "@nestjs/common";
import type { Logger } from "pino";

import { ConfigService } from "../config/config.service";
import { LOGGER } from "../logging/pino-logger";
import { AdvisoryController } from "./advisory.controller";
import { createAdvisoryService } from "./advisory.factory";
import { AdvisoryService } from "./advisory.service";

@Module({
  controllers: [AdvisoryController],
  providers: [
    {
      provide: AdvisoryService,
      inject: [ConfigService, LOGGER],
      useFactory: (config: ConfigService, logger: Logger) => createAdvisoryService(config.load(), logger)
    }
  ],
  exports: [AdvisoryService]
})
export class AdvisoryModule {}
