import { BadRequestException, Controller, Get, Inject, Param, Post, Query } from "@nestjs/common";
import type { Signal, Trade } from "@tradewarden/shared";
import { TradeStatusSchema } from "@tradewarden/shared";
import { z } from "zod";

import { DecisionEngineService, type DecisionRecord, type EngineStatus } from "./decision-engine.service";

const ListQuerySchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1)
    .transform((s) => s.toUpperCase())
    .optional(),
  status: TradeStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

function parseQuery(raw: unknown): z.infer<typeof ListQuerySchema> {
  const parsed = ListQuerySchema.safeParse(raw);
  if (!parsed.success) {
    throw new BadRequestException(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  return parsed.data;
}

@Controller("engine")
export class EngineController {
  constructor(@Inject(DecisionEngineService) private readonly engine: DecisionEngineService) {}

  @Get("status")
  getStatus(): EngineStatus {
    return this.engine.getStatus();
  }

  @Post("start")
  start(): { ok: true; started: boolean } {
    return { ok: true, started: this.engine.start() };
  }

  @Post("stop")
  async stop(): Promise<{ ok: true }> {
    await this.engine.stop();
    return { ok: true };
  }

  @Post("evaluate/:symbol")
  async evaluate(@Param("symbol") symbol: string): Promise<{ signal: Signal | null }> {
    return { signal: await this.engine.evaluateOnce(symbol) };
  }

  @Post("close/:symbol")
  close(@Param("symbol") symbol: string): { ok: true; requested: boolean } {
    return { ok: true, requested: this.engine.requestClose(symbol) };
  }

  @Get("decisions")
  getDecisions(@Query() query: Record<string, unknown>): DecisionRecord[] {
    const { symbol, limit } = parseQuery(query);
    return this.engine.getDecisions({ symbol, limit });
  }

  @Get("trades")
  async getTrades(@Query() query: Record<string, unknown>): Promise<Trade[]> {
    return await this.engine.listTrades(parseQuery(query));
  }
}
