import assert from "node:assert/strict";
import test from "node:test";
import {
  adjustCloseOutward,
  entryPriceFor,
  gridStepSatisfied,
  meetsGridEntryCondition,
  scaledWaitMs,
  takeProfitPriceFor
} from "./grid.js";

test("gridStepSatisfied measures spacing against every active close", () => {
  assert.equal(gridStepSatisfied(50351, [50100], 0.5), true);
  assert.equal(gridStepSatisfied(50300, [50100], 0.5), false);
  assert.equal(gridStepSatisfied(50100, [50100], -100), true);
  assert.equal(gridStepSatisfied(50100, [], 0.5), true);
});

test("adjustCloseOutward moves sell closes up past the blockers", () => {
  assert.equal(adjustCloseOutward(50100, [50100], 0.5, "sell", 1), 50351);
  assert.equal(adjustCloseOutward(50100, [50100, 50351], 0.5, "sell", 1), 50603);
  assert.equal(adjustCloseOutward(50100, [50100], 0, "sell", 1), 50100);
});

test("adjustCloseOutward moves buy closes down past the blockers", () => {
  assert.equal(adjustCloseOutward(49900, [49900], 0.5, "buy", 1), 49651);
});

test("meetsGridEntryCondition compares the predicted close with the nearest one", () => {
  const base = { takeProfitPct: 0.2, gridStepPct: 0.5 };
  assert.equal(
    meetsGridEntryCondition({ ...base, direction: "buy", quote: { bid: 49600, ask: 49602 }, activeCloses: [50100] }),
    true
  );
  assert.equal(
    meetsGridEntryCondition({ ...base, direction: "buy", quote: { bid: 49999, ask: 50001 }, activeCloses: [50100] }),
    false
  );
  assert.equal(
    meetsGridEntryCondition({ ...base, direction: "sell", quote: { bid: 50400, ask: 50402 }, activeCloses: [49900] }),
    true
  );
  assert.equal(meetsGridEntryCondition({ ...base, direction: "buy", quote: { bid: 49999, ask: 50001 }, activeCloses: [] }), true);
  assert.equal(
    meetsGridEntryCondition({ direction: "buy", quote: { bid: 49999, ask: 50001 }, takeProfitPct: 0.2, gridStepPct: -100, activeCloses: [50100] }),
    true
  );
});

test("scaledWaitMs follows the share of open closes", () => {
  assert.equal(scaledWaitMs(1000, 4, 6), 2000);
  assert.equal(scaledWaitMs(1000, 2, 6), 1000);
  assert.equal(scaledWaitMs(1000, 1, 6), 500);
  assert.equal(scaledWaitMs(1000, 0, 6), 250);
});

test("entry and take-profit prices sit on the tick grid", () => {
  const quote = { bid: 49999, ask: 50001 };
  assert.equal(entryPriceFor("buy", quote, 1), 50000);
  assert.equal(entryPriceFor("sell", quote, 1), 50000);
  assert.equal(entryPriceFor("buy", { bid: 100.1, ask: 100.3 }, 0.1), 100.2);
  assert.equal(takeProfitPriceFor("buy", 50000, 0.2, 1), 50100);
  assert.equal(takeProfitPriceFor("sell", 50000, 0.2, 1), 49900);
});
