import type { OrderSide } from "./enums.js";

export type RoundingMode = "down" | "up" | "nearest";

function countDecimals(value: number): number {
  const text = String(value).toLowerCase();
  if (text.includes("e-")) {
    const [, exp] = text.split("e-");
    const expValue = Number(exp);
    return Number.isFinite(expValue) ? expValue : 0;
  }

  const dot = text.indexOf(".");
  if (dot < 0) return 0;
  return text.length - dot - 1;
}

function isValidIncrement(increment: number): boolean {
  return Number.isFinite(increment) && increment > 0;
}

export function sum(xs: number[]): number {
  return xs.reduce((a, b) => a + b, 0);
}

export function average(xs: number[]): number {
  if (xs.length === 0) return 0;
  return sum(xs) / xs.length;
}

export function roundToIncrement(value: number, increment: number, mode: RoundingMode = "nearest"): number {
  if (!isValidIncrement(increment)) return value;
  const ratio = value / increment;
  const aligned =
    mode === "down"
      ? Math.floor(ratio) * increment
      : mode === "up"
        ? Math.ceil(ratio) * increment
        : Math.round(ratio) * increment;
  const decimals = Math.max(countDecimals(increment), 0);
  return Number(aligned.toFixed(Math.min(12, decimals + 2)));
}

export function roundPriceToTick(price: number, tickSize: number, mode: RoundingMode = "nearest"): number {
  return roundToIncrement(price, tickSize, mode);
}

export function oppositeSide(side: OrderSide): OrderSide {
  return side === "buy" ? "sell" : "buy";
}

/** +1 for buy, -1 for sell. */
export function sideSign(side: OrderSide): 1 | -1 {
  return side === "buy" ? 1 : -1;
}

/** Moves `price` by `pct` percent; positive goes up. */
export function shiftByPct(price: number, pct: number): number {
  return price * (1 + pct / 100);
}

/** Percentage gap between two prices measured from the lower one. */
export function spacingPct(a: number, b: number): number {
  const lo = Math.min(a, b);
  const hi = Math.max(a, b);
  if (lo <= 0) return Number.POSITIVE_INFINITY;
  return (hi / lo - 1) * 100;
}

export type Rng = () => number;

export function makeRng(seed: number): Rng {
  let state = (Math.floor(seed) >>> 0) || 1;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export function randBetween(min: number, max: number, rng?: Rng): number {
  const next = rng ? rng() : Math.random();
  return min + next * (max - min);
}
