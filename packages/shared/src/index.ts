export * from "./errors";
export * from "./schemas/advisory";
export * from "./schemas/app-config";
export * from "./schemas/backtest";
export * from "./schemas/market";
export * from "./schemas/signal";
export * from "./schemas/trade";
