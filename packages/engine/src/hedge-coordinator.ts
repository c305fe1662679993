import {
  ExecutionError,
  createLogger,
  errorMessage,
  oppositeSide,
  safeNotify,
  sideSign,
  type Instrument,
  type Logger,
  type Notifier,
  type Order,
  type OrderHandle,
  type OrderSide,
  type OrderUpdate
} from "@hedgegrid/core";
import { sleep, withRetry, type ExchangeClient, type PlaceOrderRequest } from "@hedgegrid/exchange";
import { EventHub } from "./event-hub.js";
import { SerialQueue } from "./serial-queue.js";

export type HedgeState = "HEDGING" | "PROFIT_PENDING" | "CLOSING" | "COMPLETED";

const NEXT_STATE: Record<HedgeState, HedgeState | null> = {
  HEDGING: "PROFIT_PENDING",
  PROFIT_PENDING: "CLOSING",
  CLOSING: "COMPLETED",
  COMPLETED: null
};

export type PrimaryFill = {
  orderId: string;
  side: OrderSide;
  qty: number;
  price: number;
  fee?: number;
};

export type TakeProfitFill = {
  orderId: string;
  side: OrderSide;
  price: number;
  fee?: number;
};

export type HedgePosition = {
  id: string;
  primaryOrderId: string;
  hedgeOrderId: string | null;
  takeProfitOrderId: string | null;
  closingOrderId: string | null;
  qty: number;
  primarySide: OrderSide;
  hedgeSide: OrderSide;
  state: HedgeState;
  history: HedgeState[];
  primaryFillPrice: number;
  hedgeEntryPrice: number | null;
  takeProfitFillPrice: number | null;
  hedgeClosePrice: number | null;
  fees: number;
  createdAt: number;
  completedAt: number | null;
  realizedPnl: number | null;
  attempts: number;
  atRisk: boolean;
  lastError: string | null;
  inFlight: boolean;
};

export type HedgeEvents = {
  hedge_opened: { position: HedgePosition };
  hedge_closing: { position: HedgePosition };
  hedge_completed: { position: HedgePosition };
  hedge_at_risk: { position: HedgePosition; error: string };
};

export type HedgeStatus = {
  venue: string;
  instrument: Instrument;
  active: number;
  atRisk: number;
  completed: number;
  realizedPnl: number;
  halted: boolean;
  positions: HedgePosition[];
};

export type HedgeCoordinatorOptions = {
  exchange: ExchangeClient;
  instrument: Instrument;
  delayMs: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
  /** Interval of the at-risk re-drive while started; 0 or absent disables it. */
  retryIntervalMs?: number;
  log?: Logger;
  notifier?: Notifier;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

type PendingTakeProfit = TakeProfitFill;

type Leg = "open" | "close";

/** The leg a position waits on, or null when nothing can be re-placed for it. */
function pendingLeg(state: HedgeState): Leg | null {
  if (state === "HEDGING") return "open";
  if (state === "CLOSING") return "close";
  return null;
}

/** Profit side of the primary leg: always opposite the primary entry. */
export function profitSideFor(primarySide: OrderSide): OrderSide {
  return oppositeSide(primarySide);
}

/** Closing the hedge trades back the hedge side, i.e. the primary side. */
export function closeHedgeSideFor(hedgeSide: OrderSide): OrderSide {
  return oppositeSide(hedgeSide);
}

/** Primary leg plus hedge leg, net of every fee paid on either venue. */
export function computeHedgePnl(position: HedgePosition): number {
  const tp = position.takeProfitFillPrice ?? position.primaryFillPrice;
  const hedgeEntry = position.hedgeEntryPrice ?? 0;
  const hedgeClose = position.hedgeClosePrice ?? hedgeEntry;
  const primaryLeg = (tp - position.primaryFillPrice) * sideSign(position.primarySide) * position.qty;
  const hedgeLeg = (hedgeClose - hedgeEntry) * sideSign(position.hedgeSide) * position.qty;
  return primaryLeg + hedgeLeg - position.fees;
}

/**
 * Mirrors each primary fill on a second venue and unwinds it after the primary
 * take-profit fills. Each position moves HEDGING -> PROFIT_PENDING -> CLOSING ->
 * COMPLETED and has at most one order in flight.
 */
export class HedgeCoordinator {
  readonly events: EventHub<HedgeEvents>;

  private readonly exchange: ExchangeClient;
  private readonly instrument: Instrument;
  private readonly options: HedgeCoordinatorOptions;
  private readonly log: Logger;
  private readonly queue: SerialQueue;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private readonly positions = new Map<string, HedgePosition>();
  private readonly byPrimary = new Map<string, string>();
  private readonly byHedgeOrder = new Map<string, { positionId: string; leg: Leg }>();
  private readonly pendingTakeProfit = new Map<string, PendingTakeProfit>();
  private readonly completed: HedgePosition[] = [];

  private unsubscribe: (() => void) | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private halted = false;
  private seq = 0;
  private realizedPnl = 0;

  constructor(options: HedgeCoordinatorOptions) {
    this.options = options;
    this.exchange = options.exchange;
    this.instrument = options.instrument;
    this.log = options.log ?? createLogger("hedge-coordinator", { venue: options.exchange.venue });
    this.queue = new SerialQueue("hedge", this.log);
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? sleep;
    this.events = new EventHub<HedgeEvents>(this.log);
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.exchange.subscribeOrderUpdates((update) => {
      void this.queue.push(() => this.handleOrderUpdate(update), "hedge-update");
    });

    const intervalMs = this.options.retryIntervalMs ?? 0;
    if (intervalMs > 0) {
      this.retryTimer = setInterval(() => {
        this.retryAtRisk().catch((error: unknown) => {
          this.log.error({ err: errorMessage(error) }, "at-risk hedge retry failed");
        });
      }, intervalMs);
      this.retryTimer.unref();
    }
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.retryTimer) {
      clearInterval(this.retryTimer);
      this.retryTimer = null;
    }
  }

  onPrimaryFill(fill: PrimaryFill): HedgePosition | null {
    if (this.halted) {
      this.log.warn({ primaryOrderId: fill.orderId }, "hedging halted; primary fill not hedged");
      return null;
    }
    if (this.byPrimary.has(fill.orderId)) return null;

    this.seq += 1;
    const position: HedgePosition = {
      id: `hedge-${this.seq}`,
      primaryOrderId: fill.orderId,
      hedgeOrderId: null,
      takeProfitOrderId: null,
      closingOrderId: null,
      qty: fill.qty,
      primarySide: fill.side,
      hedgeSide: oppositeSide(fill.side),
      state: "HEDGING",
      history: ["HEDGING"],
      primaryFillPrice: fill.price,
      hedgeEntryPrice: null,
      takeProfitFillPrice: null,
      hedgeClosePrice: null,
      fees: fill.fee ?? 0,
      createdAt: this.now(),
      completedAt: null,
      realizedPnl: null,
      attempts: 0,
      atRisk: false,
      lastError: null,
      inFlight: false
    };
    this.positions.set(position.id, position);
    this.byPrimary.set(fill.orderId, position.id);
    this.log.info({ hedgeId: position.id, primaryOrderId: fill.orderId, side: position.hedgeSide, qty: fill.qty }, "hedge created");

    void this.queue.push(async () => {
      if (this.options.delayMs > 0) await this.sleep(this.options.delayMs);
      await this.submitLeg(position, "open");
    }, "hedge-open");
    return { ...position };
  }

  attachTakeProfit(primaryOrderId: string, takeProfitOrderId: string): void {
    const position = this.findByPrimary(primaryOrderId);
    if (position) position.takeProfitOrderId = takeProfitOrderId;
  }

  onTakeProfitFilled(primaryOrderId: string, fill: TakeProfitFill): void {
    void this.queue.push(() => this.applyTakeProfit(primaryOrderId, fill), "take-profit");
  }

  getProfitSide(positionId: string): OrderSide {
    return profitSideFor(this.require(positionId).primarySide);
  }

  getCloseHedgeSide(positionId: string): OrderSide {
    return closeHedgeSideFor(this.require(positionId).hedgeSide);
  }

  isCompleted(positionId: string): boolean {
    const position = this.positions.get(positionId) ?? this.completed.find((p) => p.id === positionId);
    return position?.state === "COMPLETED";
  }

  getPosition(positionId: string): HedgePosition | null {
    const position = this.positions.get(positionId) ?? this.completed.find((p) => p.id === positionId);
    return position ? { ...position, history: [...position.history] } : null;
  }

  findByPrimaryOrder(primaryOrderId: string): HedgePosition | null {
    const id = this.byPrimary.get(primaryOrderId);
    return id ? this.getPosition(id) : null;
  }

  /**
   * Re-drives at-risk positions stuck on a hedge order (HEDGING or CLOSING) and
   * resolves with how many were re-driven. A position flagged in PROFIT_PENDING
   * (take-profit side mismatch) has no order to re-place and stays at risk.
   */
  async retryAtRisk(): Promise<number> {
    let redriven = 0;
    const stuck = [...this.positions.values()].filter((position) => position.atRisk);
    for (const position of stuck) {
      await this.queue.push(async () => {
        if (!position.atRisk || this.halted || position.inFlight) return;
        const leg = pendingLeg(position.state);
        if (!leg) {
          this.log.warn(
            { hedgeId: position.id, state: position.state, err: position.lastError },
            "at-risk hedge has no leg to retry; left for manual review"
          );
          return;
        }
        position.atRisk = false;
        position.attempts = 0;
        position.lastError = null;
        redriven += 1;
        this.log.info({ hedgeId: position.id, state: position.state, leg }, "retrying at-risk hedge");
        await this.submitLeg(position, leg);
      }, "retry-at-risk");
    }
    return redriven;
  }

  /** Signed hedge-venue quantity currently held across open positions. */
  openExposure(): number {
    let net = 0;
    for (const position of this.positions.values()) {
      if (position.hedgeEntryPrice === null || position.hedgeClosePrice !== null) continue;
      net += sideSign(position.hedgeSide) * position.qty;
    }
    return net;
  }

  /** Stops new hedge actions; in-flight retries give up at their next failure. */
  halt(): void {
    this.halted = true;
  }

  /** Drops every active position after its exposure was flattened elsewhere. */
  releaseAll(reason: string): HedgePosition[] {
    const released = [...this.positions.values()].map((position) => ({ ...position, lastError: reason }));
    for (const position of released) {
      this.log.warn({ hedgeId: position.id, state: position.state, reason }, "hedge released");
    }
    this.positions.clear();
    this.byPrimary.clear();
    this.byHedgeOrder.clear();
    this.pendingTakeProfit.clear();
    return released;
  }

  idle(): Promise<void> {
    return this.queue.idle();
  }

  getStatus(): HedgeStatus {
    const positions = [...this.positions.values()];
    return {
      venue: this.exchange.venue,
      instrument: this.instrument,
      active: positions.length,
      atRisk: positions.filter((position) => position.atRisk).length,
      completed: this.completed.length,
      realizedPnl: this.realizedPnl,
      halted: this.halted,
      positions: positions.map((position) => ({ ...position, history: [...position.history] }))
    };
  }

  private async applyTakeProfit(primaryOrderId: string, fill: TakeProfitFill): Promise<void> {
    const position = this.findByPrimary(primaryOrderId);
    if (!position) {
      this.log.warn({ primaryOrderId, takeProfitOrderId: fill.orderId }, "take-profit fill without hedge position");
      return;
    }

    const expected = profitSideFor(position.primarySide);
    if (fill.side !== expected) {
      const message = `take-profit side ${fill.side} does not match profit side ${expected}`;
      this.log.error({ hedgeId: position.id, takeProfitOrderId: fill.orderId }, message);
      this.markAtRisk(position, message);
      return;
    }

    position.takeProfitOrderId = fill.orderId;
    if (position.state === "HEDGING") {
      this.pendingTakeProfit.set(position.id, fill);
      this.log.info({ hedgeId: position.id }, "take-profit filled before hedge confirmation; close queued");
      return;
    }
    if (position.state !== "PROFIT_PENDING") return;

    this.recordTakeProfit(position, fill);
    await this.submitLeg(position, "close");
  }

  private recordTakeProfit(position: HedgePosition, fill: TakeProfitFill): void {
    position.takeProfitFillPrice = fill.price;
    position.fees += fill.fee ?? 0;
    this.transition(position, "CLOSING");
    this.events.emit("hedge_closing", { position: { ...position } });
  }

  private async submitLeg(position: HedgePosition, leg: Leg): Promise<void> {
    if (this.halted || position.inFlight || position.state === "COMPLETED") return;

    const expectedState: HedgeState = leg === "open" ? "HEDGING" : "CLOSING";
    if (position.state !== expectedState) return;

    const existing = leg === "open" ? position.hedgeOrderId : position.closingOrderId;
    if (existing) {
      await this.reconcile(position, leg, existing);
      return;
    }

    const request: PlaceOrderRequest = {
      instrument: this.instrument,
      side: leg === "open" ? position.hedgeSide : closeHedgeSideFor(position.hedgeSide),
      type: "market",
      qty: position.qty,
      role: leg === "open" ? "hedge_open" : "hedge_close",
      reduceOnly: leg === "close"
    };

    position.inFlight = true;
    let handle: OrderHandle;
    try {
      handle = await withRetry(
        (attempt) => {
          position.attempts = attempt;
          return this.exchange.placeOrder(request);
        },
        {
          attempts: this.options.retryAttempts,
          baseDelayMs: this.options.retryBaseDelayMs,
          sleep: this.sleep,
          shouldRetry: () => !this.halted,
          onRetry: ({ attempt, delayMs, error }) => {
            position.lastError = errorMessage(error);
            this.log.warn({ hedgeId: position.id, leg, attempt, delayMs, err: position.lastError }, "hedge order retry");
          }
        }
      );
    } catch (error) {
      position.inFlight = false;
      this.markAtRisk(position, errorMessage(error));
      return;
    }

    if (leg === "open") position.hedgeOrderId = handle.orderId;
    else position.closingOrderId = handle.orderId;
    this.byHedgeOrder.set(handle.orderId, { positionId: position.id, leg });
    this.log.info({ hedgeId: position.id, leg, orderId: handle.orderId, side: request.side }, "hedge order placed");

    await this.reconcile(position, leg, handle.orderId);
  }

  /** Confirms from the venue's view of the order; a push update may confirm first. */
  private async reconcile(position: HedgePosition, leg: Leg, orderId: string): Promise<void> {
    position.inFlight = true;
    let order: Order | null;
    try {
      order = await withRetry(
        () => this.exchange.getOrder({ orderId, venue: this.exchange.venue, instrument: this.instrument }),
        { attempts: this.options.retryAttempts, baseDelayMs: this.options.retryBaseDelayMs, sleep: this.sleep }
      );
    } catch (error) {
      this.log.warn({ hedgeId: position.id, orderId, err: errorMessage(error) }, "hedge order check failed; waiting for update");
      return;
    }

    if (!order) return;
    if (order.status === "filled" && order.avgFillPrice !== null) {
      this.confirm(position, leg, orderId, order.avgFillPrice, order.fee);
      return;
    }
    if (order.status === "cancelled" || order.status === "rejected") {
      this.dropLegOrder(position, leg, orderId);
      this.markAtRisk(position, `hedge ${leg} order ${orderId} ${order.status}`);
    }
  }

  private async handleOrderUpdate(update: OrderUpdate): Promise<void> {
    if (update.venue !== this.exchange.venue) return;
    const ref = this.byHedgeOrder.get(update.orderId);
    if (!ref) return;
    const position = this.positions.get(ref.positionId);
    if (!position) return;

    if (update.status === "filled" && update.fillPrice !== null) {
      this.confirm(position, ref.leg, update.orderId, update.fillPrice, update.fee ?? 0);
      return;
    }
    if ((update.status === "cancelled" || update.status === "rejected") && position.inFlight) {
      this.dropLegOrder(position, ref.leg, update.orderId);
      this.markAtRisk(position, `hedge ${ref.leg} order ${update.orderId} ${update.status}`);
    }
  }

  private confirm(position: HedgePosition, leg: Leg, orderId: string, price: number, fee: number): void {
    const expectedState: HedgeState = leg === "open" ? "HEDGING" : "CLOSING";
    const expectedOrder = leg === "open" ? position.hedgeOrderId : position.closingOrderId;
    if (position.state !== expectedState || expectedOrder !== orderId) return;

    position.inFlight = false;
    position.attempts = 0;
    position.atRisk = false;
    position.fees += fee;

    if (leg === "open") {
      position.hedgeEntryPrice = price;
      this.transition(position, "PROFIT_PENDING");
      this.log.info({ hedgeId: position.id, price }, "hedge confirmed");
      this.events.emit("hedge_opened", { position: { ...position } });

      const queued = this.pendingTakeProfit.get(position.id);
      if (queued) {
        this.pendingTakeProfit.delete(position.id);
        this.recordTakeProfit(position, queued);
        void this.queue.push(() => this.submitLeg(position, "close"), "hedge-close");
      }
      return;
    }

    position.hedgeClosePrice = price;
    position.completedAt = this.now();
    this.transition(position, "COMPLETED");
    position.realizedPnl = computeHedgePnl(position);
    this.realizedPnl += position.realizedPnl;

    this.positions.delete(position.id);
    this.byPrimary.delete(position.primaryOrderId);
    if (position.hedgeOrderId) this.byHedgeOrder.delete(position.hedgeOrderId);
    this.byHedgeOrder.delete(orderId);
    this.completed.push(position);

    this.log.info({ hedgeId: position.id, realizedPnl: position.realizedPnl, fees: position.fees }, "hedge completed");
    this.events.emit("hedge_completed", { position: { ...position } });
  }

  private transition(position: HedgePosition, next: HedgeState): void {
    if (NEXT_STATE[position.state] !== next) {
      throw new ExecutionError(`hedge ${position.id} cannot move ${position.state} -> ${next}`, {
        venue: this.exchange.venue
      });
    }
    position.state = next;
    position.history.push(next);
  }

  private dropLegOrder(position: HedgePosition, leg: Leg, orderId: string): void {
    this.byHedgeOrder.delete(orderId);
    if (leg === "open") position.hedgeOrderId = null;
    else position.closingOrderId = null;
  }

  private markAtRisk(position: HedgePosition, error: string): void {
    position.inFlight = false;
    position.atRisk = true;
    position.lastError = error;
    this.log.error({ hedgeId: position.id, state: position.state, attempts: position.attempts, err: error }, "hedge at risk");
    safeNotify(
      this.options.notifier,
      this.log,
      "critical",
      `Hedge ${position.id} (${position.state}, ${position.qty} ${this.instrument} on ${this.exchange.venue}) is at risk: ${error}`
    );
    this.events.emit("hedge_at_risk", { position: { ...position }, error });
  }

  private findByPrimary(primaryOrderId: string): HedgePosition | undefined {
    const id = this.byPrimary.get(primaryOrderId);
    return id ? this.positions.get(id) : undefined;
  }

  private require(positionId: string): HedgePosition {
    const position = this.positions.get(positionId) ?? this.completed.find((p) => p.id === positionId);
    if (!position) throw new ExecutionError(`unknown hedge position ${positionId}`, { venue: this.exchange.venue });
    return position;
  }
}
