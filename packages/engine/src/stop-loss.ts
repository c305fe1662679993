import {
  ExecutionError,
  createLogger,
  errorMessage,
  isTerminalStatus,
  safeNotify,
  type Instrument,
  type Logger,
  type Notifier,
  type OrderHandle,
  type OrderSide,
  type PositionSide
} from "@hedgegrid/core";
import { sleep, withRetry, type ExchangeClient } from "@hedgegrid/exchange";

export type FlattenTarget = {
  label: string;
  exchange: ExchangeClient;
  instrument: Instrument;
  side: PositionSide;
  qty: number;
};

export type FlattenOutcome = {
  label: string;
  venue: string;
  instrument: Instrument;
  side: PositionSide;
  requestedQty: number;
  closedQty: number;
  remainingQty: number;
  attempts: number;
  flat: boolean;
};

export type StopLossReport = {
  reason: string;
  allFlat: boolean;
  outcomes: FlattenOutcome[];
};

export type StopLossOptions = {
  pollIntervalMs: number;
  maxRetries: number;
  /** Retry budget for each individual venue call inside an attempt. */
  callRetryAttempts?: number;
  callRetryBaseDelayMs?: number;
  log?: Logger;
  notifier?: Notifier;
  sleep?: (ms: number) => Promise<void>;
};

type LiveOrder = { handle: OrderHandle; qty: number };

const QTY_EPSILON = 1e-9;

export function closingSideFor(side: PositionSide): OrderSide {
  return side === "long" ? "sell" : "buy";
}

/**
 * Flattens positions with limit orders at the touch: best bid to close a long,
 * best ask to close a short. Unfilled remainders are cancelled and repriced
 * every poll interval up to `maxRetries` times.
 */
export class StopLossExecutor {
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private running: Promise<StopLossReport> | null = null;

  constructor(private readonly options: StopLossOptions) {
    this.log = options.log ?? createLogger("stop-loss");
    this.sleep = options.sleep ?? sleep;
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  /** Concurrent calls share the flatten already in progress. */
  flatten(targets: FlattenTarget[], reason: string): Promise<StopLossReport> {
    if (this.running) {
      this.log.info({ reason }, "stop-loss already running; joining");
      return this.running;
    }
    const run = this.run(targets, reason).finally(() => {
      this.running = null;
    });
    this.running = run;
    return run;
  }

  private async run(targets: FlattenTarget[], reason: string): Promise<StopLossReport> {
    this.log.warn({ reason, targets: targets.map((t) => ({ label: t.label, side: t.side, qty: t.qty })) }, "stop-loss started");
    safeNotify(this.options.notifier, this.log, "critical", `Stop-loss started: ${reason}`);

    const outcomes: FlattenOutcome[] = [];
    for (const target of targets) {
      outcomes.push(await this.flattenOne(target));
    }

    const allFlat = outcomes.every((outcome) => outcome.flat);
    if (allFlat) {
      this.log.info({ reason, outcomes }, "stop-loss complete; all positions flat");
      safeNotify(this.options.notifier, this.log, "critical", `Stop-loss complete, all positions flat (${reason})`);
    } else {
      const open = outcomes.filter((outcome) => !outcome.flat);
      this.log.fatal({ reason, open }, "stop-loss exhausted retries with open exposure");
      safeNotify(
        this.options.notifier,
        this.log,
        "critical",
        `STOP-LOSS FAILED: ${open.map((o) => `${o.label} ${o.remainingQty} ${o.instrument} on ${o.venue}`).join(", ")} still open. Manual action required.`
      );
    }

    return { reason, allFlat, outcomes };
  }

  private async flattenOne(target: FlattenTarget): Promise<FlattenOutcome> {
    const side = closingSideFor(target.side);
    const venue = target.exchange.venue;
    let remaining = target.qty;
    let attempts = 0;
    // placed and not yet known to be terminal; its fills still count
    let live: LiveOrder | null = null;

    while ((live !== null || remaining > QTY_EPSILON) && attempts < this.options.maxRetries) {
      attempts += 1;
      try {
        if (live) {
          remaining = Math.max(0, remaining - (await this.settle(target, live, attempts)));
          live = null;
          if (remaining <= QTY_EPSILON) break;
        }
        live = await this.place(target, side, remaining, attempts);
        await this.sleep(this.options.pollIntervalMs);
        remaining = Math.max(0, remaining - (await this.settle(target, live, attempts)));
        live = null;
      } catch (error) {
        this.log.error(
          { err: errorMessage(error), label: target.label, attempt: attempts, orderId: live?.handle.orderId ?? null },
          "stop-loss attempt failed"
        );
        if (attempts < this.options.maxRetries) await this.sleep(this.options.pollIntervalMs);
      }
    }

    if (live) {
      const pending = live;
      try {
        remaining = Math.max(0, remaining - (await this.settle(target, pending, attempts)));
        live = null;
      } catch (error) {
        this.log.fatal(
          { err: errorMessage(error), label: target.label, orderId: pending.handle.orderId },
          "stop-loss order state unknown after last attempt"
        );
      }
    }

    const flat = live === null && remaining <= QTY_EPSILON;
    return {
      label: target.label,
      venue,
      instrument: target.instrument,
      side: target.side,
      requestedQty: target.qty,
      closedQty: target.qty - (flat ? 0 : remaining),
      remainingQty: flat ? 0 : remaining,
      attempts,
      flat
    };
  }

  private async place(target: FlattenTarget, side: OrderSide, qty: number, attempt: number): Promise<LiveOrder> {
    const exchange = target.exchange;
    const quote = await this.call(() => exchange.getBestBidAsk(target.instrument));
    const price = side === "sell" ? quote.bid : quote.ask;

    const handle = await this.call(() =>
      exchange.placeOrder({
        instrument: target.instrument,
        side,
        type: "limit",
        price,
        qty,
        role: "stop_loss",
        reduceOnly: true
      })
    );
    this.log.warn({ label: target.label, attempt, side, price, qty, orderId: handle.orderId }, "stop-loss order placed");
    return { handle, qty };
  }

  /**
   * Checks the order and cancels what is left of it. Resolves with the executed
   * quantity only once the venue reports the order terminal.
   */
  private async settle(target: FlattenTarget, live: LiveOrder, attempt: number): Promise<number> {
    const exchange = target.exchange;
    const { handle, qty } = live;

    const order = await this.call(() => exchange.getOrder(handle));
    if (order && isTerminalStatus(order.status)) {
      const executed = Math.min(qty, order.filledQty);
      this.log.info(
        { label: target.label, attempt, orderId: handle.orderId, status: order.status, filledQty: executed },
        "stop-loss order settled"
      );
      return executed;
    }

    const cancel = await this.call(() => exchange.cancelOrder(handle));
    const after = await this.call(() => exchange.getOrder(handle));
    if (after && !isTerminalStatus(after.status)) {
      throw new ExecutionError(`stop-loss order ${handle.orderId} still ${after.status} after cancel`, {
        venue: exchange.venue,
        orderId: handle.orderId
      });
    }

    const executed = Math.min(qty, Math.max(order?.filledQty ?? 0, cancel.filledQty, after?.filledQty ?? 0));
    this.log.warn(
      { label: target.label, attempt, orderId: handle.orderId, filledQty: executed, remaining: qty - executed },
      "stop-loss order not filled; cancelled for repricing"
    );
    return executed;
  }

  private call<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      attempts: this.options.callRetryAttempts ?? 3,
      baseDelayMs: this.options.callRetryBaseDelayMs ?? 500,
      sleep: this.sleep
    });
  }
}
