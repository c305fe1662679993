export type OrderSide = "buy" | "sell";
export type PositionSide = "long" | "short";
export type OrderType = "limit" | "market";

export type OrderRole = "entry" | "take_profit" | "stop_loss" | "hedge_open" | "hedge_close";

export type OrderStatus = "pending" | "open" | "partially_filled" | "filled" | "cancelled" | "rejected";

export type Severity = "info" | "warning" | "critical";

export const TERMINAL_ORDER_STATUSES: ReadonlySet<OrderStatus> = new Set(["filled", "cancelled", "rejected"]);

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.has(status);
}
