import { roundPriceToTick, shiftByPct, spacingPct, type MarketQuote, type OrderSide } from "@hedgegrid/core";

export type GridPolicy = "shift" | "defer";

const SPACING_EPSILON = 1e-9;

export function gridStepEnabled(gridStepPct: number): boolean {
  return gridStepPct > 0;
}

/** True when `price` is at least `gridStepPct` away from every active close. */
export function gridStepSatisfied(price: number, activeCloses: readonly number[], gridStepPct: number): boolean {
  if (!gridStepEnabled(gridStepPct)) return true;
  return activeCloses.every((other) => spacingPct(price, other) + SPACING_EPSILON >= gridStepPct);
}

/**
 * Pushes a close price away from the position until it clears every active
 * close by the grid step: up for a sell close, down for a buy close.
 */
export function adjustCloseOutward(
  price: number,
  activeCloses: readonly number[],
  gridStepPct: number,
  closeSide: OrderSide,
  tickSize: number
): number {
  if (!gridStepEnabled(gridStepPct)) return price;

  let candidate = price;
  for (let guard = 0; guard <= activeCloses.length; guard += 1) {
    const blockers = activeCloses.filter((other) => spacingPct(candidate, other) + SPACING_EPSILON < gridStepPct);
    if (blockers.length === 0) return candidate;

    candidate =
      closeSide === "sell"
        ? roundPriceToTick(shiftByPct(Math.max(...blockers), gridStepPct), tickSize, "up")
        : roundPriceToTick(Math.min(...blockers) / (1 + gridStepPct / 100), tickSize, "down");
  }
  return candidate;
}

/**
 * Entry pre-check: the close an entry at the touch would get must sit at least
 * one grid step beyond the nearest active close on the adverse side.
 */
export function meetsGridEntryCondition(params: {
  direction: OrderSide;
  quote: MarketQuote;
  takeProfitPct: number;
  gridStepPct: number;
  activeCloses: readonly number[];
}): boolean {
  const { direction, quote, takeProfitPct, gridStepPct, activeCloses } = params;
  if (!gridStepEnabled(gridStepPct) || activeCloses.length === 0) return true;

  const threshold = 1 + gridStepPct / 100;
  if (direction === "buy") {
    const predicted = shiftByPct(quote.ask, takeProfitPct);
    return Math.min(...activeCloses) / predicted > threshold;
  }
  const predicted = shiftByPct(quote.bid, -takeProfitPct);
  return predicted / Math.max(...activeCloses) > threshold;
}

/**
 * Wait time scaled by how much of `maxOrders` is taken by open closes:
 * 2x from two thirds, 1x from a third, 1/2 from a sixth, 1/4 below that.
 */
export function scaledWaitMs(waitTimeMs: number, activeCloses: number, maxOrders: number): number {
  const ratio = maxOrders > 0 ? activeCloses / maxOrders : 1;
  if (ratio >= 2 / 3) return waitTimeMs * 2;
  if (ratio >= 1 / 3) return waitTimeMs;
  if (ratio >= 1 / 6) return waitTimeMs / 2;
  return waitTimeMs / 4;
}

export function entryPriceFor(direction: OrderSide, quote: MarketQuote, tickSize: number): number {
  return direction === "buy"
    ? roundPriceToTick(quote.ask - tickSize, tickSize, "nearest")
    : roundPriceToTick(quote.bid + tickSize, tickSize, "nearest");
}

export function takeProfitPriceFor(direction: OrderSide, fillPrice: number, takeProfitPct: number, tickSize: number): number {
  const pct = direction === "buy" ? takeProfitPct : -takeProfitPct;
  return roundPriceToTick(shiftByPct(fillPrice, pct), tickSize, "nearest");
}
