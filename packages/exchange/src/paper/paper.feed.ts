import { makeRng, randBetween, roundPriceToTick, type MarketQuote, type Rng } from "@hedgegrid/core";

export type PaperMarketFeedOptions = {
  startPrice: number;
  tickSize: number;
  /** Largest move per step, in percent of the current mid. */
  maxStepPct?: number;
  spreadTicks?: number;
  seed?: number;
};

/** Seeded random walk of best bid/ask for running against the paper venue. */
export class PaperMarketFeed {
  private readonly rng: Rng;
  private readonly maxStepPct: number;
  private readonly spreadTicks: number;
  private mid: number;

  constructor(private readonly options: PaperMarketFeedOptions) {
    this.rng = makeRng(options.seed ?? 1);
    this.maxStepPct = options.maxStepPct ?? 0.05;
    this.spreadTicks = Math.max(1, Math.floor(options.spreadTicks ?? 2));
    this.mid = options.startPrice;
  }

  current(): MarketQuote {
    const half = (this.spreadTicks * this.options.tickSize) / 2;
    const bid = roundPriceToTick(this.mid - half, this.options.tickSize, "down");
    const ask = roundPriceToTick(Math.max(this.mid + half, bid + this.options.tickSize), this.options.tickSize, "up");
    return { bid, ask };
  }

  step(): MarketQuote {
    const movePct = randBetween(-this.maxStepPct, this.maxStepPct, this.rng);
    this.mid = Math.max(this.options.tickSize * 10, this.mid * (1 + movePct / 100));
    return this.current();
  }
}
