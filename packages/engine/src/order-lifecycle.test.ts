import assert from "node:assert/strict";
import test from "node:test";
import { NetworkError, createSilentLogger, type OrderUpdate, type Severity } from "@hedgegrid/core";
import { PaperExchange } from "@hedgegrid/exchange";
import { OrderLifecycleManager, type LifecycleEvents, type LifecycleSettings } from "./order-lifecycle.js";

const BASE: LifecycleSettings = {
  instrument: "BTC-PERP",
  quantity: 0.01,
  tickSize: 1,
  direction: "buy",
  takeProfitPct: 0.2,
  gridStepPct: -100,
  gridPolicy: "shift",
  waitTimeMs: 0,
  adaptiveWaitTime: false,
  maxOrders: 5,
  stopPrice: null,
  pausePrice: null,
  maxLossPct: null,
  orderRetryAttempts: 3,
  retryBaseDelayMs: 0
};

function setup(overrides: Partial<LifecycleSettings> = {}) {
  const clock = { now: 0 };
  const exchange = new PaperExchange("paper", { makerFeeRate: 0, takerFeeRate: 0, matchOnPlace: false, now: () => clock.now });
  const notices: Array<{ severity: Severity; message: string }> = [];
  const stops: string[] = [];
  const events: Array<keyof LifecycleEvents> = [];

  const lifecycle = new OrderLifecycleManager({
    settings: { ...BASE, ...overrides },
    exchange,
    log: createSilentLogger(),
    notifier: {
      notify(severity, message) {
        notices.push({ severity, message });
      }
    },
    now: () => clock.now,
    sleep: async () => undefined,
    onStopRequested: (reason) => stops.push(reason)
  });

  const names: Array<keyof LifecycleEvents> = [
    "entry_placed",
    "entry_filled",
    "entry_cancelled",
    "close_placed",
    "close_deferred",
    "take_profit_filled",
    "paused",
    "resumed",
    "stopped"
  ];
  for (const name of names) lifecycle.events.on(name, () => events.push(name));

  const deliver = async (updates: OrderUpdate[]) => {
    for (const update of updates) await lifecycle.handleOrderUpdate(update);
  };

  exchange.setMarket("BTC-PERP", 49_999, 50_001);
  return { clock, exchange, lifecycle, notices, stops, events, deliver };
}

test("entry fill places a take-profit and its fill completes the cycle", async () => {
  const { exchange, lifecycle, events, deliver } = setup();

  const result = await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  assert.deepEqual(result, { status: "accepted", cycleId: 1, orderId: "paper-1", price: 50_000 });

  await deliver(exchange.setMarket("BTC-PERP", 49_998, 50_000));
  assert.deepEqual(lifecycle.getStatus().cycles, [
    {
      id: 1,
      phase: "close_pending",
      entryOrderId: "paper-1",
      entryPrice: 50_000,
      fillPrice: 50_000,
      filledQty: 0.01,
      closeOrderId: "paper-2",
      closePrice: 50_100,
      deferred: null
    }
  ]);

  const [tp] = exchange.openOrders();
  assert.equal(tp?.side, "sell");
  assert.equal(tp?.role, "take_profit");
  assert.equal(tp?.qty, 0.01);

  await deliver(exchange.setMarket("BTC-PERP", 50_100, 50_102));
  const status = lifecycle.getStatus();
  assert.equal(status.completedCycles, 1);
  assert.equal(status.activeOrders, 0);
  assert.deepEqual(status.cycles, []);
  assert.deepEqual(events, ["entry_placed", "entry_filled", "close_placed", "take_profit_filled"]);
});

test("grid step shifts a colliding take-profit outward", async () => {
  const { exchange, lifecycle, deliver } = setup({ gridStepPct: 0.5 });

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  await deliver(exchange.setMarket("BTC-PERP", 49_998, 50_000));

  exchange.setMarket("BTC-PERP", 49_600, 49_602);
  const second = await lifecycle.tryOpenEntry({ bid: 49_600, ask: 49_602 });
  assert.deepEqual(second, { status: "accepted", cycleId: 2, orderId: "paper-3", price: 49_601 });

  await deliver([exchange.fillOrder("paper-3", { price: 50_000 })]);
  const closes = lifecycle.getStatus().cycles.map((cycle) => cycle.closePrice);
  assert.deepEqual(closes, [50_100, 50_351]);
});

test("grid step rejects an entry whose close would land too near an open one", async () => {
  const { exchange, lifecycle, deliver } = setup({ gridStepPct: 0.5 });

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  await deliver(exchange.setMarket("BTC-PERP", 49_998, 50_000));

  assert.deepEqual(await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 }), { status: "rejected", reason: "grid_step" });
});

test("defer policy holds the close until the blocking one fills", async () => {
  const { exchange, lifecycle, events, deliver } = setup({ gridStepPct: 0.5, gridPolicy: "defer" });

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  await deliver(exchange.setMarket("BTC-PERP", 49_998, 50_000));
  exchange.setMarket("BTC-PERP", 49_600, 49_602);
  await lifecycle.tryOpenEntry({ bid: 49_600, ask: 49_602 });
  await deliver([exchange.fillOrder("paper-3", { price: 50_000 })]);

  const deferred = lifecycle.getStatus().cycles[1];
  assert.equal(deferred?.phase, "position_open");
  assert.equal(deferred?.deferred, "grid_step");
  assert.equal(deferred?.closeOrderId, null);
  assert.equal(events.filter((name) => name === "close_deferred").length, 1);

  await deliver(exchange.setMarket("BTC-PERP", 50_100, 50_102));
  const status = lifecycle.getStatus();
  assert.equal(status.completedCycles, 1);
  assert.equal(status.cycles.length, 1);
  assert.equal(status.cycles[0]?.id, 2);
  assert.equal(status.cycles[0]?.phase, "close_pending");
  assert.equal(status.cycles[0]?.closePrice, 50_100);
  assert.equal(status.cycles[0]?.deferred, null);
});

test("stop price stops the lifecycle once and cancels the pending entry", async () => {
  const { exchange, lifecycle, notices, stops } = setup({ stopPrice: 55_000 });

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  const result = await lifecycle.tryOpenEntry({ bid: 54_999, ask: 55_000 });

  assert.deepEqual(result, { status: "rejected", reason: "stop_price" });
  assert.deepEqual(stops, ["stop price 55000 reached (ask 55000)"]);
  assert.equal(lifecycle.isStopped(), true);
  assert.deepEqual(exchange.openOrders(), []);
  assert.deepEqual(notices, [
    { severity: "critical", message: "Trading stopped on paper BTC-PERP: stop price 55000 reached (ask 55000)" }
  ]);

  assert.deepEqual(await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 }), { status: "rejected", reason: "stopped" });
  assert.equal(await lifecycle.evaluateStopPrice({ bid: 54_999, ask: 55_000 }), true);
  assert.equal(stops.length, 1);
});

test("sell direction stops on the bid", async () => {
  const { lifecycle, stops } = setup({ direction: "sell", stopPrice: 45_000 });

  assert.equal(await lifecycle.evaluateStopPrice({ bid: 45_001, ask: 45_003 }), false);
  assert.equal(await lifecycle.evaluateStopPrice({ bid: 45_000, ask: 45_002 }), true);
  assert.deepEqual(stops, ["stop price 45000 reached (bid 45000)"]);
});

test("wait time holds the next entry back", async () => {
  const { clock, exchange, lifecycle, deliver } = setup({ waitTimeMs: 10_000 });

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  await deliver(exchange.setMarket("BTC-PERP", 49_998, 50_000));

  clock.now = 5_000;
  assert.deepEqual(await lifecycle.tryOpenEntry({ bid: 49_998, ask: 50_000 }), { status: "rejected", reason: "cooldown" });

  clock.now = 10_000;
  const result = await lifecycle.tryOpenEntry({ bid: 49_998, ask: 50_000 });
  assert.equal(result.status, "accepted");
  lifecycle.dispose();
});

test("adaptive wait time is waived once a close fills", async () => {
  const { clock, exchange, lifecycle, deliver } = setup({ waitTimeMs: 60_000, adaptiveWaitTime: true, maxOrders: 6 });

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  await deliver(exchange.setMarket("BTC-PERP", 49_998, 50_000));

  clock.now = 1_000;
  assert.deepEqual(await lifecycle.tryOpenEntry({ bid: 49_998, ask: 50_000 }), { status: "rejected", reason: "cooldown" });

  await deliver(exchange.setMarket("BTC-PERP", 50_100, 50_102));
  const result = await lifecycle.tryOpenEntry({ bid: 50_100, ask: 50_102 });
  assert.deepEqual(result, { status: "accepted", cycleId: 2, orderId: "paper-3", price: 50_101 });
  lifecycle.dispose();
});

test("one pending entry at a time, capped by max orders", async () => {
  const capped = setup({ maxOrders: 1 });
  await capped.lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  assert.deepEqual(await capped.lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 }), { status: "rejected", reason: "max_orders" });

  const open = setup();
  await open.lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  assert.deepEqual(await open.lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 }), { status: "rejected", reason: "entry_pending" });
});

test("loss of margin stops trading once every slot holds a take-profit", async () => {
  const { exchange, lifecycle, stops, notices, deliver } = setup({ maxOrders: 1, maxLossPct: 40 });
  assert.equal(await lifecycle.evaluateLossLimit(), false);

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  await deliver(exchange.setMarket("BTC-PERP", 49_998, 50_000));
  assert.equal(lifecycle.getStatus().activeCloses, 1);
  assert.equal(await lifecycle.evaluateLossLimit(), false);

  exchange.setMarket("BTC-PERP", 46_999, 47_001);
  assert.equal(await lifecycle.evaluateLossLimit(), true);

  const reason = "loss 60.00% of margin reached 40% with 1/1 orders open";
  assert.deepEqual(stops, [reason]);
  assert.deepEqual(notices, [{ severity: "critical", message: `Trading stopped on paper BTC-PERP: ${reason}` }]);
  assert.equal(lifecycle.isStopped(), true);
  assert.equal(await lifecycle.evaluateLossLimit(), false);
});

test("crossed or empty quotes are rejected", async () => {
  const { lifecycle } = setup();
  assert.deepEqual(await lifecycle.tryOpenEntry({ bid: 50_001, ask: 49_999 }), { status: "rejected", reason: "invalid_quote" });
  assert.deepEqual(await lifecycle.tryOpenEntry({ bid: 0, ask: 50_001 }), { status: "rejected", reason: "invalid_quote" });
});

test("pause price toggles entries idempotently", async () => {
  const { lifecycle, events } = setup({ pausePrice: 51_000 });

  assert.equal(lifecycle.evaluatePausePrice({ bid: 50_999, ask: 51_000 }), true);
  assert.equal(lifecycle.evaluatePausePrice({ bid: 50_999, ask: 51_000 }), true);
  assert.equal(lifecycle.isPaused(), true);
  assert.deepEqual(await lifecycle.tryOpenEntry({ bid: 50_999, ask: 51_000 }), { status: "rejected", reason: "paused" });

  assert.equal(lifecycle.evaluatePausePrice({ bid: 49_999, ask: 50_001 }), false);
  assert.equal(lifecycle.isPaused(), false);
  assert.deepEqual(events, ["paused", "resumed"]);
});

test("pause reasons are tracked independently", () => {
  const { lifecycle } = setup();

  lifecycle.setPaused("drawdown", true);
  lifecycle.setPaused("price", true);
  lifecycle.setPaused("price", false);
  assert.equal(lifecycle.isPaused(), true);
  assert.deepEqual(lifecycle.getStatus().pausedBy, ["drawdown"]);
});

test("stale entry is cancelled and the slot freed", async () => {
  const { exchange, lifecycle, events } = setup();

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  assert.equal(await lifecycle.repriceStaleEntry({ bid: 49_998, ask: 50_000 }), false);
  assert.equal(await lifecycle.repriceStaleEntry({ bid: 50_049, ask: 50_051 }), true);

  const status = lifecycle.getStatus();
  assert.equal(status.activeOrders, 0);
  assert.equal(status.lastEntryAt, null);
  assert.equal(exchange.listOrders()[0]?.status, "cancelled");
  assert.equal(events.at(-1), "entry_cancelled");
});

test("partially filled stale entry keeps a take-profit for the filled quantity", async () => {
  const { exchange, lifecycle, deliver } = setup();

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  await deliver([exchange.fillOrder("paper-1", { qty: 0.004 })]);
  assert.equal(await lifecycle.repriceStaleEntry({ bid: 50_049, ask: 50_051 }), true);

  const open = exchange.openOrders();
  assert.equal(open.length, 1);
  assert.equal(open[0]?.id, "paper-2");
  assert.equal(open[0]?.qty, 0.004);
  assert.equal(open[0]?.price, 50_100);
});

test("a partial entry fill seen only in the cancel result counts toward the position", async () => {
  const { exchange, lifecycle } = setup();

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  exchange.fillOrder("paper-1", { qty: 0.004 });
  await lifecycle.stop("test");

  const [cycle] = lifecycle.getStatus().cycles;
  assert.equal(cycle?.phase, "position_open");
  assert.equal(cycle?.filledQty, 0.004);
  assert.equal(cycle?.fillPrice, 50_000);

  const position = lifecycle.openPosition();
  assert.equal(position.side, "long");
  assert.equal(position.netQty, 0.004);
});

test("a take-profit fill seen only in the cancel result is priced at its limit when the lookup fails", async () => {
  const { exchange, lifecycle, deliver } = setup();

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  await deliver(exchange.setMarket("BTC-PERP", 49_998, 50_000));
  exchange.fillOrder("paper-2", { qty: 0.004 });
  exchange.injectFailure("getOrder", new NetworkError("down", { venue: "paper", operation: "getOrder" }), 3);
  await lifecycle.cancelCloseOrders();

  const position = lifecycle.openPosition();
  assert.equal(position.side, "long");
  assert.ok(Math.abs(position.netQty - 0.006) < 1e-12);
  assert.equal(exchange.listOrders()[1]?.status, "cancelled");
});

test("a failed take-profit submission is deferred and retried", async () => {
  const { exchange, lifecycle, notices, deliver } = setup();

  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
  exchange.injectFailure("placeOrder", new NetworkError("down", { venue: "paper", operation: "placeOrder" }), 3);
  await deliver(exchange.setMarket("BTC-PERP", 49_998, 50_000));

  const [cycle] = lifecycle.getStatus().cycles;
  assert.equal(cycle?.phase, "position_open");
  assert.equal(cycle?.deferred, "submit_failed");
  assert.deepEqual(notices, [
    { severity: "critical", message: "Take-profit for BTC-PERP @ 50100 could not be placed on paper: down" }
  ]);

  await lifecycle.retryDeferredCloses();
  const [retried] = lifecycle.getStatus().cycles;
  assert.equal(retried?.phase, "close_pending");
  assert.equal(retried?.closeOrderId, "paper-2");
  assert.equal(retried?.deferred, null);
});

test("position without matching closes pauses entries until they are placed", async () => {
  const { exchange, lifecycle, deliver } = setup();
  const down = () => new NetworkError("down", { venue: "paper", operation: "placeOrder" });

  for (let i = 1; i <= 3; i += 1) {
    await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });
    exchange.injectFailure("placeOrder", down(), 3);
    await deliver([exchange.fillOrder(`paper-${i}`)]);
    if (i === 2) assert.equal(lifecycle.checkPositionMismatch(), false);
  }

  assert.equal(lifecycle.checkPositionMismatch(), true);
  assert.deepEqual(lifecycle.getStatus().pausedBy, ["mismatch"]);
  assert.deepEqual(await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 }), { status: "rejected", reason: "paused" });

  await lifecycle.retryDeferredCloses();
  assert.equal(lifecycle.checkPositionMismatch(), false);
  assert.equal(lifecycle.isPaused(), false);
});

test("updates for other venues or unknown orders are ignored", async () => {
  const { lifecycle } = setup();
  await lifecycle.tryOpenEntry({ bid: 49_999, ask: 50_001 });

  const fill: OrderUpdate = {
    orderId: "paper-1",
    venue: "elsewhere",
    instrument: "BTC-PERP",
    status: "filled",
    fillPrice: 50_000,
    fillQty: 0.01,
    ts: 0
  };
  await lifecycle.handleOrderUpdate(fill);
  await lifecycle.handleOrderUpdate({ ...fill, venue: "paper", orderId: "paper-99" });
  assert.equal(lifecycle.getStatus().cycles[0]?.phase, "entry_pending");
});
