import type { OrderRole, OrderSide, OrderStatus, OrderType, PositionSide } from "./enums.js";

export type Money = number;

export type Instrument = string;
export type VenueId = string;

export interface Order {
  id: string;
  venue: VenueId;
  instrument: Instrument;
  side: OrderSide;
  role: OrderRole;
  type: OrderType;
  price: number | null;
  qty: number;
  filledQty: number;
  avgFillPrice: number | null;
  fee: Money;
  status: OrderStatus;
  createdAt: number; // ms
}

export interface OrderHandle {
  orderId: string;
  venue: VenueId;
  instrument: Instrument;
}

/**
 * Push notification from a venue about one order. `fillQty` and `fillPrice` are
 * cumulative for the order (filled so far, volume-weighted average).
 */
export interface OrderUpdate {
  orderId: string;
  venue: VenueId;
  instrument: Instrument;
  status: OrderStatus;
  fillPrice: number | null;
  fillQty: number;
  fee?: Money;
  ts: number; // ms
}

export interface MarketQuote {
  bid: number;
  ask: number;
  ts?: number;
}

export interface Position {
  venue: VenueId;
  instrument: Instrument;
  side: PositionSide | null;
  /** Signed: positive long, negative short. */
  netQty: number;
  avgEntryPrice: number | null;
}
