import assert from "node:assert/strict";
import test from "node:test";
import { createSilentLogger, loadTradingConfig } from "@hedgegrid/core";
import { TradingSession } from "@hedgegrid/engine";
import { PaperExchange } from "@hedgegrid/exchange";
import { getRunnerHealth, healthResponse } from "./health.js";

function session(drawdown = false) {
  const config = loadTradingConfig({
    exchange: "paper",
    instrument: "BTC-PERP",
    quantity: 0.01,
    tickSize: 1,
    direction: "buy",
    takeProfitPct: 0.2,
    waitTimeMs: 0,
    maxOrders: 3,
    drawdown: { enabled: drawdown }
  });
  return new TradingSession({ config, primary: new PaperExchange("paper"), log: createSilentLogger() });
}

test("health reports the idle session and its slot", () => {
  const health = getRunnerHealth(session().getStatus(), 1_000, 4_000);
  assert.deepEqual(health, {
    ok: true,
    service: "runner",
    startedAt: 1_000,
    uptimeMs: 3_000,
    session: "idle",
    reason: null,
    slot: "paper:BTC-PERP",
    lastTickAt: null,
    pausedBy: [],
    activeOrders: 0,
    completedCycles: 0,
    drawdown: null,
    hedge: null
  });
});

test("health carries pause reasons and the drawdown tier", () => {
  const s = session(true);
  s.lifecycle.setPaused("drawdown", true);
  s.monitor?.ingest(10_000);

  const health = getRunnerHealth(s.getStatus(), 0, 0);
  assert.deepEqual(health.pausedBy, ["drawdown"]);
  assert.deepEqual(health.drawdown, { tier: "none", drawdownPct: 0, peak: 10_000 });
});

test("healthResponse serves /health and 404s elsewhere", () => {
  const health = getRunnerHealth(session().getStatus(), 0, 0);

  const ok = healthResponse("/health?verbose=1", health);
  assert.equal(ok.statusCode, 200);
  assert.deepEqual(JSON.parse(ok.body), health);

  assert.equal(healthResponse("/metrics", health).statusCode, 404);
  assert.equal(healthResponse("/health", { ...health, ok: false, session: "failed" }).statusCode, 503);
});
