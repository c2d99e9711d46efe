import type { AdvisorResponse, Direction, IndicatorSnapshot, SignalScores } from "@tradewarden/shared";

export type AdvisorRequestKind = "MARKET_ANALYSIS" | "SIGNAL_VALIDATION";

export type SignalContext = {
  kind: AdvisorRequestKind;
  symbol: string;
  direction: Direction;
  strength: number;
  scores: SignalScores;
  reasons: string[];
  snapshot: IndicatorSnapshot;
  order?: {
    sizeUSD: number;
    entryPrice: number;
    stopLossPrice: number;
    takeProfitPrice: number;
  };
};

export interface AdvisorPort {
  infer(context: SignalContext, signal: AbortSignal): Promise<AdvisorResponse>;
}
