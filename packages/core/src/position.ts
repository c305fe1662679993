import type { Instrument, Order, Position, VenueId } from "./types.js";
import { sideSign } from "./math.js";

const QTY_EPSILON = 1e-12;

/**
 * Net position for one (venue, instrument) replayed from executed quantity, in
 * creation order. Reducing fills keep the average entry price; a fill that flips
 * the sign restarts it at that fill's price. An order with no average fill price
 * is counted at its limit price.
 */
export function derivePosition(orders: Iterable<Order>, venue: VenueId, instrument: Instrument): Position {
  const executed = [...orders]
    .filter(
      (order) =>
        order.venue === venue &&
        order.instrument === instrument &&
        order.filledQty > 0 &&
        (order.avgFillPrice ?? order.price) !== null
    )
    .sort((a, b) => a.createdAt - b.createdAt);

  let netQty = 0;
  let avgEntryPrice: number | null = null;

  for (const order of executed) {
    const price = order.avgFillPrice ?? order.price ?? 0;
    const delta = sideSign(order.side) * order.filledQty;
    const next = netQty + delta;

    if (netQty === 0 || Math.sign(netQty) === Math.sign(delta)) {
      const prevNotional: number = Math.abs(netQty) * (avgEntryPrice ?? 0);
      avgEntryPrice = (prevNotional + Math.abs(delta) * price) / Math.abs(next);
    } else if (Math.abs(next) <= QTY_EPSILON) {
      avgEntryPrice = null;
    } else if (Math.sign(next) !== Math.sign(netQty)) {
      avgEntryPrice = price;
    }

    netQty = Math.abs(next) <= QTY_EPSILON ? 0 : next;
  }

  return {
    venue,
    instrument,
    side: netQty > 0 ? "long" : netQty < 0 ? "short" : null,
    netQty,
    avgEntryPrice: netQty === 0 ? null : avgEntryPrice
  };
}
