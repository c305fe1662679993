import assert from "node:assert/strict";
import test from "node:test";
import { loadTradingConfig, readTradingConfigFromEnv } from "./config.js";
import { ConfigurationError } from "./errors.js";

const base = {
  exchange: "paper",
  instrument: "BTC-PERP",
  quantity: 0.01,
  tickSize: 0.1,
  direction: "buy",
  takeProfitPct: 0.2,
  waitTimeMs: 30_000,
  maxOrders: 5
};

test("loadTradingConfig applies defaults and freezes the result", () => {
  const config = loadTradingConfig(base);

  assert.equal(config.gridPolicy, "shift");
  assert.equal(config.gridStepPct, -100);
  assert.equal(config.stopPrice, null);
  assert.equal(config.drawdown.lightPct, 5);
  assert.equal(config.drawdown.mediumPct, 8);
  assert.equal(config.drawdown.severePct, 12);
  assert.equal(config.drawdown.smoothingWindow, 3);
  assert.equal(config.drawdown.strictMode, false);
  assert.equal(config.stopLoss.pollIntervalMs, 5_000);
  assert.equal(config.maxLossPct, null);
  assert.equal(config.hedge.retryIntervalMs, 60_000);
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.drawdown), true);
});

test("loadTradingConfig rejects thresholds out of order", () => {
  assert.throws(
    () => loadTradingConfig({ ...base, drawdown: { lightPct: 8, mediumPct: 5, severePct: 12 } }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.issues.length, 1);
      assert.match(error.issues[0] ?? "", /^drawdown: drawdown thresholds must satisfy light < medium < severe/);
      return true;
    }
  );
});

test("loadTradingConfig rejects equal thresholds", () => {
  assert.throws(
    () => loadTradingConfig({ ...base, drawdown: { lightPct: 5, mediumPct: 5, severePct: 12 } }),
    ConfigurationError
  );
});

test("loadTradingConfig requires a hedge venue when hedging", () => {
  assert.throws(
    () => loadTradingConfig({ ...base, hedge: { enabled: true } }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.deepEqual(error.issues, ["hedge.exchange: hedge exchange is required when hedging is enabled"]);
      return true;
    }
  );
});

test("loadTradingConfig requires the pause price to come before the stop price", () => {
  assert.throws(
    () => loadTradingConfig({ ...base, pausePrice: 56_000, stopPrice: 55_000 }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.deepEqual(error.issues, [
        "pausePrice: pause price must be reached before the stop price when trading buy (got pause 56000, stop 55000)"
      ]);
      return true;
    }
  );
  assert.throws(() => loadTradingConfig({ ...base, direction: "sell", pausePrice: 44_000, stopPrice: 45_000 }), ConfigurationError);

  assert.equal(loadTradingConfig({ ...base, pausePrice: 55_000, stopPrice: 55_000 }).pausePrice, 55_000);
  assert.equal(loadTradingConfig({ ...base, direction: "sell", pausePrice: 45_000, stopPrice: 44_000 }).stopPrice, 44_000);
  assert.equal(loadTradingConfig({ ...base, pausePrice: 56_000 }).stopPrice, null);
});

test("loadTradingConfig rejects invalid ranges", () => {
  assert.throws(() => loadTradingConfig({ ...base, quantity: 0 }), ConfigurationError);
  assert.throws(() => loadTradingConfig({ ...base, maxOrders: 1.5 }), ConfigurationError);
  assert.throws(() => loadTradingConfig({ ...base, direction: "long" }), ConfigurationError);
});

test("readTradingConfigFromEnv converts seconds and disabled prices", () => {
  const config = readTradingConfigFromEnv({
    EXCHANGE: "paper",
    INSTRUMENT: "ETH-PERP",
    QUANTITY: "0.5",
    TICK_SIZE: "0.01",
    DIRECTION: "SELL",
    TAKE_PROFIT: "0.3",
    GRID_STEP: "0.5",
    WAIT_TIME: "20",
    MAX_ORDERS: "10",
    STOP_PRICE: "-1",
    PAUSE_PRICE: "",
    ENABLE_DRAWDOWN_MONITOR: "true",
    DRAWDOWN_POLL_INTERVAL: "30",
    CACHE_DURATION: "90",
    STRICT_MODE: "1",
    ENABLE_HEDGE: "true",
    HEDGE_EXCHANGE: "paper-hedge",
    HEDGE_DELAY: "0.5",
    HEDGE_RETRY_INTERVAL: "30",
    MAX_LOSS_PCT: "40"
  });

  assert.equal(config.direction, "sell");
  assert.equal(config.waitTimeMs, 20_000);
  assert.equal(config.gridStepPct, 0.5);
  assert.equal(config.stopPrice, null);
  assert.equal(config.pausePrice, null);
  assert.equal(config.drawdown.enabled, true);
  assert.equal(config.drawdown.pollIntervalMs, 30_000);
  assert.equal(config.drawdown.cacheDurationMs, 90_000);
  assert.equal(config.drawdown.strictMode, true);
  assert.equal(config.hedge.exchange, "paper-hedge");
  assert.equal(config.hedge.delayMs, 500);
  assert.equal(config.hedge.retryIntervalMs, 30_000);
  assert.equal(config.maxLossPct, 40);
});

test("readTradingConfigFromEnv rejects non-numeric input", () => {
  assert.throws(
    () =>
      readTradingConfigFromEnv({
        EXCHANGE: "paper",
        INSTRUMENT: "ETH-PERP",
        QUANTITY: "lots",
        TICK_SIZE: "0.01",
        DIRECTION: "buy",
        TAKE_PROFIT: "0.3",
        WAIT_TIME: "20",
        MAX_ORDERS: "10"
      }),
    ConfigurationError
  );
});
