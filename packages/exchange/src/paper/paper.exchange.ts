import {
  NetworkError,
  OrderRejectedError,
  derivePosition,
  isTerminalStatus,
  sideSign,
  type Instrument,
  type MarketQuote,
  type Order,
  type OrderHandle,
  type OrderUpdate
} from "@hedgegrid/core";
import type {
  CancelResult,
  ExchangeClient,
  MarginSnapshot,
  OrderUpdateHandler,
  PlaceOrderRequest
} from "../exchange.interface.js";

export type PaperOperation =
  | "placeOrder"
  | "cancelOrder"
  | "getBestBidAsk"
  | "getNetWorth"
  | "getOrder"
  | "getUnrealizedPnlAndMargin";

export type PaperExchangeOptions = {
  initialCash?: number;
  makerFeeRate?: number;
  takerFeeRate?: number;
  /** Margin used per unit of notional is `1 / leverage`. Default 10. */
  leverage?: number;
  /** Fill marketable limit orders as soon as they are placed. Default true. */
  matchOnPlace?: boolean;
  now?: () => number;
};

export type PaperFillOptions = {
  qty?: number;
  price?: number;
};

type InjectedFailure = {
  error: Error;
  remaining: number;
};

const DEFAULT_INITIAL_CASH = 10_000;
const DEFAULT_MAKER_FEE_RATE = 0.0002;
const DEFAULT_TAKER_FEE_RATE = 0.0005;
const DEFAULT_LEVERAGE = 10;
const QTY_EPSILON = 1e-9;

/**
 * In-process venue. Limit orders rest until the market crosses them (or a test
 * calls `fillOrder`); market orders fill at the touch. Updates are delivered
 * synchronously to subscribers. Reduce-only orders never grow or flip the net
 * position: they are rejected on placement and expire at fill time once the
 * position is gone.
 */
export class PaperExchange implements ExchangeClient {
  private readonly orders = new Map<string, Order>();
  private readonly quotes = new Map<Instrument, MarketQuote>();
  private readonly handlers = new Set<OrderUpdateHandler>();
  private readonly failures = new Map<PaperOperation, InjectedFailure>();
  private readonly reduceOnly = new Set<string>();
  private readonly makerFeeRate: number;
  private readonly takerFeeRate: number;
  private readonly leverage: number;
  private readonly matchOnPlace: boolean;
  private readonly now: () => number;
  private cash: number;
  private seq = 0;

  constructor(
    readonly venue: string,
    options: PaperExchangeOptions = {}
  ) {
    this.cash = options.initialCash ?? DEFAULT_INITIAL_CASH;
    this.makerFeeRate = options.makerFeeRate ?? DEFAULT_MAKER_FEE_RATE;
    this.takerFeeRate = options.takerFeeRate ?? DEFAULT_TAKER_FEE_RATE;
    this.leverage = options.leverage ?? DEFAULT_LEVERAGE;
    this.matchOnPlace = options.matchOnPlace ?? true;
    this.now = options.now ?? (() => Date.now());
  }

  /** The next `times` calls of `op` reject with `error`. */
  injectFailure(op: PaperOperation, error: Error, times = 1): void {
    this.failures.set(op, { error, remaining: times });
  }

  setMarket(instrument: Instrument, bid: number, ask: number): OrderUpdate[] {
    if (!(bid > 0) || !(ask >= bid)) {
      throw new RangeError(`invalid market ${bid}/${ask} for ${instrument}`);
    }
    this.quotes.set(instrument, { bid, ask, ts: this.now() });

    const updates: OrderUpdate[] = [];
    for (const order of this.sortedOrders()) {
      if (order.instrument !== instrument || isTerminalStatus(order.status) || order.price === null) continue;
      const crossed = order.side === "buy" ? ask <= order.price : bid >= order.price;
      if (!crossed) continue;
      updates.push(this.fill(order, order.qty - order.filledQty, order.price, this.makerFeeRate));
    }
    return updates;
  }

  fillOrder(orderId: string, options: PaperFillOptions = {}): OrderUpdate {
    const order = this.orders.get(orderId);
    if (!order) throw new RangeError(`unknown paper order ${orderId}`);
    if (isTerminalStatus(order.status)) throw new RangeError(`paper order ${orderId} is ${order.status}`);

    const remaining = order.qty - order.filledQty;
    const qty = Math.min(options.qty ?? remaining, remaining);
    const price = options.price ?? order.price ?? this.touch(order.instrument, order.side);
    const rate = order.type === "market" ? this.takerFeeRate : this.makerFeeRate;
    return this.fill(order, qty, price, rate);
  }

  listOrders(instrument?: Instrument): Order[] {
    return this.sortedOrders()
      .filter((order) => instrument === undefined || order.instrument === instrument)
      .map((order) => ({ ...order }));
  }

  openOrders(instrument?: Instrument): Order[] {
    return this.listOrders(instrument).filter((order) => !isTerminalStatus(order.status));
  }

  async placeOrder(req: PlaceOrderRequest): Promise<OrderHandle> {
    this.consumeFailure("placeOrder");

    if (!(req.qty > 0)) {
      throw new OrderRejectedError(`quantity must be positive (got ${req.qty})`, {
        venue: this.venue,
        operation: "placeOrder",
        code: "INVALID_QTY"
      });
    }
    if (req.type === "limit" && !(req.price !== undefined && req.price > 0)) {
      throw new OrderRejectedError("limit order requires a positive price", {
        venue: this.venue,
        operation: "placeOrder",
        code: "INVALID_PRICE"
      });
    }
    if (req.type === "market" && !this.quotes.has(req.instrument)) {
      throw new OrderRejectedError(`no market for ${req.instrument}`, {
        venue: this.venue,
        operation: "placeOrder",
        code: "NO_MARKET"
      });
    }
    if (req.reduceOnly) {
      const reducible = this.reducibleQty(req.instrument, req.side);
      if (req.qty > reducible + QTY_EPSILON) {
        throw new OrderRejectedError(
          `reduce-only ${req.side} ${req.qty} exceeds the ${reducible} ${req.instrument} it can close`,
          { venue: this.venue, operation: "placeOrder", code: "REDUCE_ONLY" }
        );
      }
    }

    this.seq += 1;
    const order: Order = {
      id: `${this.venue}-${this.seq}`,
      venue: this.venue,
      instrument: req.instrument,
      side: req.side,
      role: req.role,
      type: req.type,
      price: req.type === "limit" ? (req.price ?? null) : null,
      qty: req.qty,
      filledQty: 0,
      avgFillPrice: null,
      fee: 0,
      status: "open",
      createdAt: this.now()
    };
    this.orders.set(order.id, order);
    if (req.reduceOnly) this.reduceOnly.add(order.id);

    if (order.type === "market") {
      this.fill(order, order.qty, this.touch(order.instrument, order.side), this.takerFeeRate);
    } else if (this.matchOnPlace && order.price !== null) {
      const quote = this.quotes.get(order.instrument);
      const marketable = quote ? (order.side === "buy" ? quote.ask <= order.price : quote.bid >= order.price) : false;
      if (marketable) this.fill(order, order.qty, order.price, this.takerFeeRate);
    }

    return { orderId: order.id, venue: this.venue, instrument: order.instrument };
  }

  async cancelOrder(handle: OrderHandle): Promise<CancelResult> {
    this.consumeFailure("cancelOrder");

    const order = this.orders.get(handle.orderId);
    if (!order) return { ok: false, filledQty: 0 };
    if (isTerminalStatus(order.status)) return { ok: false, filledQty: order.filledQty };

    order.status = "cancelled";
    this.emit(order);
    return { ok: true, filledQty: order.filledQty };
  }

  async getBestBidAsk(instrument: Instrument): Promise<MarketQuote> {
    this.consumeFailure("getBestBidAsk");
    const quote = this.quotes.get(instrument);
    if (!quote) {
      throw new NetworkError(`no quote for ${instrument}`, {
        venue: this.venue,
        operation: "getBestBidAsk",
        code: "NO_QUOTE"
      });
    }
    return { ...quote };
  }

  /** Cash after fees plus open positions marked at mid. */
  async getNetWorth(): Promise<number> {
    this.consumeFailure("getNetWorth");
    let worth = this.cash;
    const instruments = new Set([...this.orders.values()].map((order) => order.instrument));
    for (const instrument of instruments) {
      const position = derivePosition(this.orders.values(), this.venue, instrument);
      if (position.netQty === 0) continue;
      const quote = this.quotes.get(instrument);
      const mark = quote ? (quote.bid + quote.ask) / 2 : (position.avgEntryPrice ?? 0);
      worth += position.netQty * mark;
    }
    return worth;
  }

  /** Open position on `instrument` marked at mid, with margin at the configured leverage. */
  async getUnrealizedPnlAndMargin(instrument: Instrument): Promise<MarginSnapshot> {
    this.consumeFailure("getUnrealizedPnlAndMargin");
    const position = derivePosition(this.orders.values(), this.venue, instrument);
    if (position.netQty === 0 || position.avgEntryPrice === null) return { unrealizedPnl: 0, usedMargin: 0 };

    const quote = this.quotes.get(instrument);
    const mark = quote ? (quote.bid + quote.ask) / 2 : position.avgEntryPrice;
    return {
      unrealizedPnl: position.netQty * (mark - position.avgEntryPrice),
      usedMargin: (Math.abs(position.netQty) * position.avgEntryPrice) / this.leverage
    };
  }

  async getOrder(handle: OrderHandle): Promise<Order | null> {
    this.consumeFailure("getOrder");
    const order = this.orders.get(handle.orderId);
    return order ? { ...order } : null;
  }

  subscribeOrderUpdates(handler: OrderUpdateHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async close(): Promise<void> {
    this.handlers.clear();
  }

  private fill(order: Order, qty: number, price: number, feeRate: number): OrderUpdate {
    if (!this.reduceOnly.has(order.id)) return this.applyFill(order, qty, price, feeRate);

    const allowed = Math.min(qty, this.reducibleQty(order.instrument, order.side));
    if (allowed >= qty - QTY_EPSILON) return this.applyFill(order, qty, price, feeRate);
    if (allowed > QTY_EPSILON) this.applyFill(order, allowed, price, feeRate);
    order.status = "cancelled";
    return this.emit(order);
  }

  /** Quantity an order on `side` can execute without growing or flipping the net position. */
  private reducibleQty(instrument: Instrument, side: Order["side"]): number {
    const { netQty } = derivePosition(this.orders.values(), this.venue, instrument);
    return Math.max(0, -sideSign(side) * netQty);
  }

  private applyFill(order: Order, qty: number, price: number, feeRate: number): OrderUpdate {
    const fillQty = Math.max(0, qty);
    const fee = fillQty * price * feeRate;
    const total = order.filledQty + fillQty;

    order.avgFillPrice =
      total > 0 ? ((order.avgFillPrice ?? 0) * order.filledQty + price * fillQty) / total : order.avgFillPrice;
    order.filledQty = total;
    order.fee += fee;
    order.status = total >= order.qty ? "filled" : "partially_filled";

    this.cash -= sideSign(order.side) * fillQty * price + fee;
    return this.emit(order);
  }

  private emit(order: Order): OrderUpdate {
    const update: OrderUpdate = {
      orderId: order.id,
      venue: this.venue,
      instrument: order.instrument,
      status: order.status,
      fillPrice: order.avgFillPrice,
      fillQty: order.filledQty,
      fee: order.fee,
      ts: this.now()
    };
    for (const handler of [...this.handlers]) handler(update);
    return update;
  }

  private touch(instrument: Instrument, side: Order["side"]): number {
    const quote = this.quotes.get(instrument);
    if (!quote) {
      throw new NetworkError(`no quote for ${instrument}`, {
        venue: this.venue,
        operation: "touch",
        code: "NO_QUOTE"
      });
    }
    return side === "buy" ? quote.ask : quote.bid;
  }

  private sortedOrders(): Order[] {
    return [...this.orders.values()].sort((a, b) => a.createdAt - b.createdAt || orderSeq(a) - orderSeq(b));
  }

  private consumeFailure(op: PaperOperation): void {
    const failure = this.failures.get(op);
    if (!failure) return;
    failure.remaining -= 1;
    if (failure.remaining <= 0) this.failures.delete(op);
    throw failure.error;
  }
}

function orderSeq(order: Order): number {
  const seq = Number(order.id.slice(order.id.lastIndexOf("-") + 1));
  return Number.isFinite(seq) ? seq : 0;
}
