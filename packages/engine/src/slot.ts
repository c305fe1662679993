import { createLogger, errorMessage, type Instrument, type Logger, type MarketQuote } from "@hedgegrid/core";
import type { ExchangeClient } from "@hedgegrid/exchange";
import type { OrderLifecycleManager } from "./order-lifecycle.js";
import { SerialQueue } from "./serial-queue.js";

export type TradingSlotOptions = {
  exchange: ExchangeClient;
  instrument: Instrument;
  lifecycle: OrderLifecycleManager;
  tickIntervalMs: number;
  log?: Logger;
};

/**
 * One (venue, instrument). Order updates and price ticks go through a single
 * queue so the lifecycle sees them strictly in arrival order.
 */
export class TradingSlot {
  readonly key: string;

  private readonly exchange: ExchangeClient;
  private readonly instrument: Instrument;
  private readonly lifecycle: OrderLifecycleManager;
  private readonly log: Logger;
  private readonly queue: SerialQueue;

  private timer: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;
  private offCooldown: (() => void) | null = null;
  private tickQueued = false;
  private ticks = 0;
  private lastTickAt: number | null = null;

  constructor(private readonly options: TradingSlotOptions) {
    this.exchange = options.exchange;
    this.instrument = options.instrument;
    this.lifecycle = options.lifecycle;
    this.key = `${options.exchange.venue}:${options.instrument}`;
    this.log = options.log ?? createLogger("slot", { slot: this.key });
    this.queue = new SerialQueue(this.key, this.log);
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.exchange.subscribeOrderUpdates((update) => {
      if (update.instrument !== this.instrument) return;
      void this.queue.push(() => this.lifecycle.handleOrderUpdate(update), "order-update");
    });
    this.offCooldown = this.lifecycle.events.on("cooldown_elapsed", () => this.requestTick());
    this.timer = setInterval(() => this.requestTick(), this.options.tickIntervalMs);
    this.log.info({ tickIntervalMs: this.options.tickIntervalMs }, "slot started");
    this.requestTick();
  }

  /** Stops ticking and detaches from the venue; queued work still drains. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.offCooldown?.();
    this.offCooldown = null;
  }

  requestTick(): void {
    if (this.tickQueued) return;
    this.tickQueued = true;
    void this.queue.push(async () => {
      this.tickQueued = false;
      await this.tick();
    }, "tick");
  }

  /** Runs `task` on the slot's queue, after everything already queued. */
  enqueue(task: () => void | Promise<void>, label: string): Promise<void> {
    return this.queue.push(task, label);
  }

  idle(): Promise<void> {
    return this.queue.idle();
  }

  getStatus(): { key: string; ticks: number; lastTickAt: number | null; queued: number } {
    return { key: this.key, ticks: this.ticks, lastTickAt: this.lastTickAt, queued: this.queue.size() };
  }

  private async tick(): Promise<void> {
    if (this.lifecycle.isStopped()) return;
    this.ticks += 1;
    this.lastTickAt = Date.now();

    let quote: MarketQuote;
    try {
      quote = await this.exchange.getBestBidAsk(this.instrument);
    } catch (error) {
      this.log.warn({ err: errorMessage(error) }, "quote unavailable; tick skipped");
      return;
    }

    if (await this.lifecycle.evaluateStopPrice(quote)) return;
    if (await this.lifecycle.evaluateLossLimit()) return;
    this.lifecycle.evaluatePausePrice(quote);
    await this.lifecycle.retryDeferredCloses();
    await this.lifecycle.repriceStaleEntry(quote);
    this.lifecycle.checkPositionMismatch();

    const result = await this.lifecycle.tryOpenEntry(quote);
    if (result.status === "accepted") {
      this.log.debug({ orderId: result.orderId, price: result.price }, "entry accepted");
    }
  }
}
