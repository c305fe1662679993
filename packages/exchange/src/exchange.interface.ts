import type {
  Instrument,
  MarketQuote,
  Order,
  OrderHandle,
  OrderRole,
  OrderSide,
  OrderType,
  OrderUpdate,
  VenueId
} from "@hedgegrid/core";

export type PlaceOrderRequest = {
  instrument: Instrument;
  side: OrderSide;
  type: OrderType;
  qty: number;
  /** Required for limit orders, ignored for market orders. */
  price?: number;
  role: OrderRole;
  reduceOnly?: boolean;
};

export type CancelResult = {
  ok: boolean;
  /** Quantity executed before the cancel took effect. */
  filledQty: number;
};

export type MarginSnapshot = {
  unrealizedPnl: number;
  usedMargin: number;
};

export type OrderUpdateHandler = (update: OrderUpdate) => void;

/**
 * One trading venue. Methods reject with `OrderRejectedError`, `RateLimitError`
 * or `NetworkError` from @hedgegrid/core; anything else is treated as a bug.
 */
export interface ExchangeClient {
  readonly venue: VenueId;
  placeOrder(req: PlaceOrderRequest): Promise<OrderHandle>;
  cancelOrder(handle: OrderHandle): Promise<CancelResult>;
  getBestBidAsk(instrument: Instrument): Promise<MarketQuote>;
  getNetWorth(): Promise<number>;
  getOrder(handle: OrderHandle): Promise<Order | null>;
  /** Optional: venues that report margin enable the loss-of-margin stop. */
  getUnrealizedPnlAndMargin?(instrument: Instrument): Promise<MarginSnapshot>;
  /** Updates arrive in venue order; the returned function unsubscribes. */
  subscribeOrderUpdates(handler: OrderUpdateHandler): () => void;
  close?(): Promise<void>;
}
