import assert from "node:assert/strict";
import test from "node:test";
import { derivePosition } from "./position.js";
import type { Order } from "./types.js";

let seq = 0;
function filled(side: Order["side"], qty: number, price: number, overrides: Partial<Order> = {}): Order {
  seq += 1;
  return {
    id: `o-${seq}`,
    venue: "paper",
    instrument: "BTC-PERP",
    side,
    role: "entry",
    type: "limit",
    price,
    qty,
    filledQty: qty,
    avgFillPrice: price,
    fee: 0,
    status: "filled",
    createdAt: seq,
    ...overrides
  };
}

test("derivePosition averages same-direction fills", () => {
  const position = derivePosition([filled("buy", 1, 100), filled("buy", 1, 110)], "paper", "BTC-PERP");
  assert.equal(position.side, "long");
  assert.equal(position.netQty, 2);
  assert.equal(position.avgEntryPrice, 105);
});

test("derivePosition keeps the average on reduce and resets when flat", () => {
  const orders = [filled("buy", 2, 100), filled("sell", 1, 120)];
  const reduced = derivePosition(orders, "paper", "BTC-PERP");
  assert.equal(reduced.netQty, 1);
  assert.equal(reduced.avgEntryPrice, 100);

  const flat = derivePosition([...orders, filled("sell", 1, 130)], "paper", "BTC-PERP");
  assert.equal(flat.side, null);
  assert.equal(flat.netQty, 0);
  assert.equal(flat.avgEntryPrice, null);
});

test("derivePosition restarts the average when the side flips", () => {
  const position = derivePosition([filled("buy", 1, 100), filled("sell", 3, 90)], "paper", "BTC-PERP");
  assert.equal(position.side, "short");
  assert.equal(position.netQty, -2);
  assert.equal(position.avgEntryPrice, 90);
});

test("derivePosition counts partial fills and ignores other venues and unfilled orders", () => {
  const position = derivePosition(
    [
      filled("sell", 1, 200, { filledQty: 0.4, status: "partially_filled" }),
      filled("sell", 1, 300, { venue: "other" }),
      filled("sell", 1, 300, { filledQty: 0, avgFillPrice: null, status: "open" })
    ],
    "paper",
    "BTC-PERP"
  );
  assert.equal(position.netQty, -0.4);
  assert.equal(position.avgEntryPrice, 200);
});

test("derivePosition prices a fill without an average at its limit", () => {
  const position = derivePosition(
    [filled("buy", 0.01, 50_000, { filledQty: 0.004, avgFillPrice: null, status: "cancelled" })],
    "paper",
    "BTC-PERP"
  );
  assert.equal(position.netQty, 0.004);
  assert.ok(Math.abs((position.avgEntryPrice ?? 0) - 50_000) < 1e-6);
});
