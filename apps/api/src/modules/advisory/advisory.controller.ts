import { Controller, Get, Inject } from "@nestjs/common";

import { AdvisoryService, type AdvisoryUsageStats } from "./advisory.service";

@Controller("advisory")
export class AdvisoryController {
  constructor(@Inject(AdvisoryService) private readonly advisory: AdvisoryService) {}

  @Get("usage")
  getUsage(): AdvisoryUsageStats {
    return this.advisory.getUsageStats();
  }
}
