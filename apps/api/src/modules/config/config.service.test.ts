import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { ConfigurationInvalidError, defaultAppConfig } from "@tradewarden/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigService } from "./config.service";

let dataDir: string;

beforeEach(() => {
  dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "config-service-"));
});

afterEach(() => {
  fs.rmSync(dataDir, { recursive: true, force: true });
});

function writeConfig(value: unknown): void {
  fs.writeFileSync(path.join(dataDir, "config.json"), typeof value === "string" ? value : JSON.stringify(value));
}

function loadError(service: ConfigService): ConfigurationInvalidError {
  try {
    service.load();
  } catch (err) {
    if (err instanceof ConfigurationInvalidError) return err;
    throw err;
  }
  throw new Error("expected load() to fail");
}

describe("ConfigService", () => {
  it("falls back to defaults and applies environment overrides", () => {
    const service = new ConfigService({
      DATA_DIR: dataDir,
      TRADING_SYMBOLS: "btcusdt, ethusdt,",
      OPENAI_API_KEY: "test-secret",
      MAX_TRADES_PER_DAY: "5",
      BINANCE_TESTNET: "false"
    });

    const config = service.load();

    expect(config.engine.symbols).toEqual(["BTCUSDT", "ETHUSDT"]);
    expect(config.advisor).toMatchObject({ enabled: true, apiKey: "test-secret", model: "gpt-4o-mini" });
    expect(config.trading).toMatchObject({ maxTradesPerDay: 5, positionSizeUSD: 100, aiDailyLimit: 50 });
    expect(config.exchange.environment).toBe("MAINNET");
  });

  it("reads the file and lets the environment win", () => {
    const file = defaultAppConfig(new Date("2024-01-01T00:00:00.000Z"));
    writeConfig({ ...file, trading: { ...file.trading, positionSizeUSD: 250, maxTradesPerDay: 2 } });
    const service = new ConfigService({ DATA_DIR: dataDir, MAX_TRADES_PER_DAY: "4" });

    const config = service.load();

    expect(config.trading.positionSizeUSD).toBe(250);
    expect(config.trading.maxTradesPerDay).toBe(4);
    expect(config.createdAt).toBe("2024-01-01T00:00:00.000Z");
  });

  it("rejects a stop loss that is not below the take profit", () => {
    const file = defaultAppConfig();
    writeConfig({ ...file, trading: { ...file.trading, stopLossPercent: 3, takeProfitPercent: 3 } });

    const err = loadError(new ConfigService({ DATA_DIR: dataDir }));

    expect(err.issues).toEqual(["trading.stopLossPercent must be below trading.takeProfitPercent"]);
  });

  it("reports environment numbers that do not parse", () => {
    const err = loadError(new ConfigService({ DATA_DIR: dataDir, POSITION_SIZE_USD: "lots" }));

    expect(err.issues).toEqual(["trading.positionSizeUSD: Expected number, received nan"]);
  });

  it("reports a file that is not JSON", () => {
    writeConfig("{ trading: ");

    const err = loadError(new ConfigService({ DATA_DIR: dataDir }));

    expect(err.issues[0]).toMatch(/config\.json is not valid JSON/);
  });
});
