import {
  createLogger,
  derivePosition,
  errorMessage,
  isTerminalStatus,
  oppositeSide,
  safeNotify,
  type Logger,
  type MarketQuote,
  type Notifier,
  type Order,
  type OrderHandle,
  type OrderUpdate,
  type Position,
  type TradingConfig
} from "@hedgegrid/core";
import { withRetry, type ExchangeClient, type MarginSnapshot, type PlaceOrderRequest } from "@hedgegrid/exchange";
import { EventHub } from "./event-hub.js";
import {
  adjustCloseOutward,
  entryPriceFor,
  gridStepSatisfied,
  meetsGridEntryCondition,
  scaledWaitMs,
  takeProfitPriceFor
} from "./grid.js";

export type LifecycleSettings = Pick<
  TradingConfig,
  | "instrument"
  | "quantity"
  | "tickSize"
  | "direction"
  | "takeProfitPct"
  | "gridStepPct"
  | "gridPolicy"
  | "waitTimeMs"
  | "adaptiveWaitTime"
  | "maxOrders"
  | "stopPrice"
  | "pausePrice"
  | "maxLossPct"
  | "orderRetryAttempts"
  | "retryBaseDelayMs"
>;

export type CyclePhase = "idle" | "entry_pending" | "position_open" | "close_pending" | "closed";
export type PauseReason = "price" | "drawdown" | "mismatch";
export type LifecycleMode = "active" | "stopped";

export type EntryRejection =
  | "stopped"
  | "stop_loss_active"
  | "invalid_quote"
  | "stop_price"
  | "paused"
  | "max_orders"
  | "entry_pending"
  | "cooldown"
  | "grid_step"
  | "submit_failed";

export type EntryResult =
  | { status: "accepted"; cycleId: number; orderId: string; price: number }
  | { status: "rejected"; reason: EntryRejection };

export type CloseDeferral = "grid_step" | "submit_failed";

export type LifecycleEvents = {
  entry_placed: { cycleId: number; order: Order };
  entry_filled: { cycleId: number; order: Order };
  entry_cancelled: { cycleId: number; order: Order };
  close_placed: { cycleId: number; entryOrderId: string; order: Order };
  close_deferred: { cycleId: number; reason: CloseDeferral };
  take_profit_filled: { cycleId: number; entryOrderId: string; order: Order };
  paused: { reason: PauseReason };
  resumed: { reason: PauseReason };
  stopped: { reason: string };
  cooldown_elapsed: { at: number };
};

export type CycleSnapshot = {
  id: number;
  phase: CyclePhase;
  entryOrderId: string;
  entryPrice: number | null;
  fillPrice: number | null;
  filledQty: number;
  closeOrderId: string | null;
  closePrice: number | null;
  deferred: CloseDeferral | null;
};

export type LifecycleStatus = {
  venue: string;
  instrument: string;
  direction: LifecycleSettings["direction"];
  mode: LifecycleMode;
  pausedBy: PauseReason[];
  stopLossActive: boolean;
  activeOrders: number;
  activeCloses: number;
  completedCycles: number;
  lastEntryAt: number | null;
  cycles: CycleSnapshot[];
};

export type OrderLifecycleOptions = {
  settings: LifecycleSettings;
  exchange: ExchangeClient;
  log?: Logger;
  notifier?: Notifier;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  /** Called once when the stop price or the loss limit is breached. */
  onStopRequested?: (reason: string) => void;
};

type EntryCycle = {
  id: number;
  phase: CyclePhase;
  entry: Order;
  close: Order | null;
  deferred: CloseDeferral | null;
};

type OrderRef = { cycleId: number; kind: "entry" | "close" };

const QTY_EPSILON = 1e-12;

/**
 * Entry -> fill -> take-profit cycles for one (venue, instrument). Calls are
 * expected to be serialized by the owning slot.
 */
export class OrderLifecycleManager {
  readonly events: EventHub<LifecycleEvents>;

  private readonly settings: LifecycleSettings;
  private readonly exchange: ExchangeClient;
  private readonly log: Logger;
  private readonly notifier?: Notifier;
  private readonly now: () => number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly onStopRequested?: (reason: string) => void;

  private readonly cycles = new Map<number, EntryCycle>();
  private readonly orderIndex = new Map<string, OrderRef>();
  private readonly pauseReasons = new Set<PauseReason>();

  private mode: LifecycleMode = "active";
  private stopLossActive = false;
  private entryInFlight = false;
  private mismatchDetected = false;
  private marginUnsupportedWarned = false;
  private nextCycleId = 1;
  private completedCycles = 0;
  private lastEntryAt: number | null = null;
  /**
   * Closes expected at the last cooldown check. Each entry adds the close it will
   * produce, so a count below this means a take-profit filled and the adaptive
   * wait is waived.
   */
  private lastCloseCount = 0;
  private cooldownTimer: NodeJS.Timeout | null = null;

  constructor(options: OrderLifecycleOptions) {
    this.settings = options.settings;
    this.exchange = options.exchange;
    this.log = options.log ?? createLogger("order-lifecycle", { venue: options.exchange.venue });
    this.notifier = options.notifier;
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep;
    this.onStopRequested = options.onStopRequested;
    this.events = new EventHub<LifecycleEvents>(this.log);
  }

  get venue(): string {
    return this.exchange.venue;
  }

  isStopped(): boolean {
    return this.mode === "stopped";
  }

  isPaused(): boolean {
    return this.pauseReasons.size > 0;
  }

  async tryOpenEntry(quote: MarketQuote): Promise<EntryResult> {
    if (this.mode === "stopped") return this.reject("stopped");
    if (this.stopLossActive) return this.reject("stop_loss_active");
    if (!isUsableQuote(quote)) return this.reject("invalid_quote");

    if (this.stopPriceBreached(quote)) {
      await this.evaluateStopPrice(quote);
      return this.reject("stop_price");
    }
    if (this.pauseReasons.size > 0) return this.reject("paused");
    if (this.activeOrderCount() >= this.settings.maxOrders) return this.reject("max_orders");
    if (this.entryInFlight || this.pendingEntry()) return this.reject("entry_pending");
    if (this.cooldownRemainingMs() > 0) return this.reject("cooldown");
    if (
      !meetsGridEntryCondition({
        direction: this.settings.direction,
        quote,
        takeProfitPct: this.settings.takeProfitPct,
        gridStepPct: this.settings.gridStepPct,
        activeCloses: this.activeClosePrices()
      })
    ) {
      return this.reject("grid_step");
    }

    const price = entryPriceFor(this.settings.direction, quote, this.settings.tickSize);
    const request: PlaceOrderRequest = {
      instrument: this.settings.instrument,
      side: this.settings.direction,
      type: "limit",
      price,
      qty: this.settings.quantity,
      role: "entry"
    };

    this.entryInFlight = true;
    let handle: OrderHandle;
    try {
      handle = await this.submit(request, "entry");
    } catch (error) {
      this.log.warn({ err: errorMessage(error), price }, "entry order failed");
      return this.reject("submit_failed");
    } finally {
      this.entryInFlight = false;
    }

    const createdAt = this.now();
    const order = toOrder(handle, request, createdAt);

    if (this.isStopped()) {
      await this.cancelQuietly(order, "entry placed after stop");
      return this.reject("stopped");
    }

    const cycle: EntryCycle = { id: this.nextCycleId++, phase: "entry_pending", entry: order, close: null, deferred: null };
    this.cycles.set(cycle.id, cycle);
    this.orderIndex.set(order.id, { cycleId: cycle.id, kind: "entry" });

    const cooldownMs = this.currentWaitMs();
    this.lastEntryAt = createdAt;
    this.lastCloseCount += 1;
    this.startCooldownTimer(cooldownMs);

    this.log.info({ cycleId: cycle.id, orderId: order.id, side: order.side, price, qty: order.qty }, "entry placed");
    this.events.emit("entry_placed", { cycleId: cycle.id, order: { ...order } });
    return { status: "accepted", cycleId: cycle.id, orderId: order.id, price };
  }

  async handleOrderUpdate(update: OrderUpdate): Promise<void> {
    if (update.venue !== this.exchange.venue || update.instrument !== this.settings.instrument) return;
    const ref = this.orderIndex.get(update.orderId);
    if (!ref) return;
    const cycle = this.cycles.get(ref.cycleId);
    if (!cycle) return;

    const order = ref.kind === "entry" ? cycle.entry : cycle.close;
    if (!order) return;
    applyUpdate(order, update);

    if (ref.kind === "entry") {
      if (cycle.phase !== "entry_pending") return;
      if (order.status === "filled") {
        await this.onEntryFilled(order);
      } else if (order.status === "cancelled" || order.status === "rejected") {
        await this.settleCancelledEntry(cycle, `entry ${order.status} by venue`);
      }
      return;
    }

    if (cycle.phase !== "close_pending") return;
    if (order.status === "filled") {
      await this.onCloseFilled(order);
    } else if (order.status === "cancelled" || order.status === "rejected") {
      this.log.warn({ cycleId: cycle.id, orderId: order.id, status: order.status }, "take-profit ended without fill");
      this.requeueClose(cycle, "submit_failed");
    }
  }

  async onEntryFilled(order: Order): Promise<void> {
    const cycle = this.cycleFor(order.id, "entry");
    if (!cycle || cycle.phase !== "entry_pending") return;

    const fillPrice = order.avgFillPrice ?? order.price;
    if (fillPrice === null || !(order.filledQty > 0)) {
      this.log.warn({ orderId: order.id }, "entry fill without price or quantity ignored");
      return;
    }

    cycle.entry = { ...order, avgFillPrice: fillPrice };
    cycle.phase = "position_open";
    this.log.info({ cycleId: cycle.id, orderId: order.id, fillPrice, qty: order.filledQty }, "entry filled");
    this.events.emit("entry_filled", { cycleId: cycle.id, order: { ...cycle.entry } });

    if (this.mode === "stopped" || this.stopLossActive) return;
    await this.placeClose(cycle);
  }

  async onCloseFilled(order: Order): Promise<void> {
    const cycle = this.cycleFor(order.id, "close");
    if (!cycle || cycle.phase !== "close_pending" || !cycle.close) return;

    cycle.close = { ...cycle.close, ...order };
    cycle.phase = "closed";
    this.completedCycles += 1;
    this.release(cycle);

    this.log.info(
      { cycleId: cycle.id, orderId: order.id, fillPrice: order.avgFillPrice, entryPrice: cycle.entry.avgFillPrice },
      "take-profit filled"
    );
    this.events.emit("take_profit_filled", { cycleId: cycle.id, entryOrderId: cycle.entry.id, order: { ...cycle.close } });
    await this.retryDeferredCloses();
  }

  /** Idempotent toggle of the price pause. */
  evaluatePausePrice(quote: MarketQuote): boolean {
    const { pausePrice, direction } = this.settings;
    const breached =
      pausePrice !== null && isUsableQuote(quote) && (direction === "buy" ? quote.ask >= pausePrice : quote.bid <= pausePrice);
    this.setPaused("price", breached);
    return breached;
  }

  async evaluateStopPrice(quote: MarketQuote): Promise<boolean> {
    if (this.mode === "stopped") return true;
    if (!isUsableQuote(quote) || !this.stopPriceBreached(quote)) return false;

    const touch = this.settings.direction === "buy" ? quote.ask : quote.bid;
    await this.requestStop(`stop price ${this.settings.stopPrice} reached (${this.settings.direction === "buy" ? "ask" : "bid"} ${touch})`);
    return true;
  }

  /**
   * Once every order slot holds a take-profit, stops trading when the unrealized
   * loss reaches `maxLossPct` percent of the margin in use. Venues that do not
   * report margin skip the check.
   */
  async evaluateLossLimit(): Promise<boolean> {
    const { maxLossPct, maxOrders, instrument } = this.settings;
    if (this.mode === "stopped" || this.stopLossActive || maxLossPct === null) return false;
    const closes = this.activeCloseCount();
    if (closes < maxOrders) return false;

    if (!this.exchange.getUnrealizedPnlAndMargin) {
      if (!this.marginUnsupportedWarned) {
        this.marginUnsupportedWarned = true;
        this.log.warn({ venue: this.venue }, "venue does not report margin; loss limit disabled");
      }
      return false;
    }

    let snapshot: MarginSnapshot;
    try {
      snapshot = await this.exchange.getUnrealizedPnlAndMargin(instrument);
    } catch (error) {
      this.log.error({ err: errorMessage(error) }, "margin lookup failed; loss check skipped");
      return false;
    }

    const { unrealizedPnl, usedMargin } = snapshot;
    if (!(usedMargin > 0) || !(unrealizedPnl < 0)) return false;
    const lossPct = (-unrealizedPnl / usedMargin) * 100;
    this.log.debug({ unrealizedPnl, usedMargin, lossPct, closes, maxOrders }, "loss of margin checked");
    if (lossPct < maxLossPct) return false;

    await this.requestStop(`loss ${lossPct.toFixed(2)}% of margin reached ${maxLossPct}% with ${closes}/${maxOrders} orders open`);
    return true;
  }

  /** Terminal: no new entries after this, and pending entries are cancelled. */
  async stop(reason: string): Promise<void> {
    if (this.mode === "stopped") return;
    this.mode = "stopped";
    this.clearCooldownTimer();
    this.log.warn({ reason }, "lifecycle stopped");

    for (const cycle of [...this.cycles.values()]) {
      if (cycle.phase !== "entry_pending") continue;
      await this.cancelQuietly(cycle.entry, "stop");
      if (cycle.entry.filledQty > QTY_EPSILON) {
        cycle.phase = "position_open";
      } else {
        cycle.phase = "closed";
        this.release(cycle);
      }
    }

    this.events.emit("stopped", { reason });
  }

  setStopLossActive(active: boolean): void {
    this.stopLossActive = active;
  }

  setPaused(reason: PauseReason, paused: boolean): void {
    if (paused === this.pauseReasons.has(reason)) return;
    if (paused) {
      this.pauseReasons.add(reason);
      this.log.warn({ reason, pausedBy: [...this.pauseReasons] }, "entries paused");
      this.events.emit("paused", { reason });
      return;
    }
    this.pauseReasons.delete(reason);
    this.log.info({ reason, pausedBy: [...this.pauseReasons] }, "pause cleared");
    this.events.emit("resumed", { reason });
  }

  /**
   * Cancels a resting entry once the touch has moved away from it. A partial
   * fill gets a take-profit for the executed quantity.
   */
  async repriceStaleEntry(quote: MarketQuote): Promise<boolean> {
    if (this.mode === "stopped" || this.stopLossActive || !isUsableQuote(quote)) return false;
    const cycle = this.pendingEntry();
    if (!cycle || cycle.entry.price === null) return false;

    const fresh = entryPriceFor(this.settings.direction, quote, this.settings.tickSize);
    const stale = this.settings.direction === "buy" ? fresh > cycle.entry.price : fresh < cycle.entry.price;
    if (!stale) return false;

    this.log.info({ cycleId: cycle.id, orderId: cycle.entry.id, resting: cycle.entry.price, fresh }, "repricing stale entry");
    const cancelled = await this.cancelQuietly(cycle.entry, "reprice");
    if (!cancelled) return false;
    if (cycle.phase !== "entry_pending") return false;

    await this.settleCancelledEntry(cycle, "entry repriced");
    return true;
  }

  /** Places closes that were held back by a grid-step collision or a failed submit. */
  async retryDeferredCloses(): Promise<void> {
    if (this.mode === "stopped" || this.stopLossActive) return;
    for (const cycle of [...this.cycles.values()]) {
      if (cycle.phase !== "position_open" || cycle.deferred === null) continue;
      await this.placeClose(cycle);
    }
  }

  /**
   * Compares the derived position with the quantity resting in take-profits. A gap
   * above twice the order size pauses entries until it closes again.
   */
  checkPositionMismatch(): boolean {
    const position = this.openPosition();
    const closing = this.activeCycles()
      .filter((cycle) => cycle.phase === "close_pending" && cycle.close)
      .reduce((acc, cycle) => acc + (cycle.close ? cycle.close.qty - cycle.close.filledQty : 0), 0);
    const gap = Math.abs(Math.abs(position.netQty) - closing);
    const mismatch = gap > 2 * this.settings.quantity;

    if (mismatch && !this.mismatchDetected) {
      this.log.error({ netQty: position.netQty, closing, gap }, "position mismatch detected");
      safeNotify(
        this.notifier,
        this.log,
        "critical",
        `Position mismatch on ${this.venue} ${this.settings.instrument}: position ${position.netQty}, closing ${closing}`
      );
    } else if (!mismatch && this.mismatchDetected) {
      this.log.info({ netQty: position.netQty, closing }, "position mismatch cleared");
    }

    this.mismatchDetected = mismatch;
    this.setPaused("mismatch", mismatch);
    return mismatch;
  }

  /** Cancels resting take-profits ahead of a flatten. */
  async cancelCloseOrders(): Promise<void> {
    for (const cycle of this.activeCycles()) {
      if (cycle.phase !== "close_pending" || !cycle.close) continue;
      await this.cancelQuietly(cycle.close, "flatten");
      cycle.phase = "position_open";
    }
  }

  openPosition(): Position {
    const orders: Order[] = [];
    for (const cycle of this.activeCycles()) {
      orders.push(cycle.entry);
      if (cycle.close) orders.push(cycle.close);
    }
    return derivePosition(orders, this.exchange.venue, this.settings.instrument);
  }

  getStatus(): LifecycleStatus {
    const cycles = this.activeCycles();
    return {
      venue: this.exchange.venue,
      instrument: this.settings.instrument,
      direction: this.settings.direction,
      mode: this.mode,
      pausedBy: [...this.pauseReasons],
      stopLossActive: this.stopLossActive,
      activeOrders: this.activeOrderCount(),
      activeCloses: this.activeCloseCount(),
      completedCycles: this.completedCycles,
      lastEntryAt: this.lastEntryAt,
      cycles: cycles.map((cycle) => ({
        id: cycle.id,
        phase: cycle.phase,
        entryOrderId: cycle.entry.id,
        entryPrice: cycle.entry.price,
        fillPrice: cycle.entry.avgFillPrice,
        filledQty: cycle.entry.filledQty,
        closeOrderId: cycle.close?.id ?? null,
        closePrice: cycle.close?.price ?? null,
        deferred: cycle.deferred
      }))
    };
  }

  dispose(): void {
    this.clearCooldownTimer();
  }

  private async requestStop(reason: string): Promise<void> {
    await this.stop(reason);
    safeNotify(this.notifier, this.log, "critical", `Trading stopped on ${this.venue} ${this.settings.instrument}: ${reason}`);
    this.onStopRequested?.(reason);
  }

  private async placeClose(cycle: EntryCycle): Promise<void> {
    const fillPrice = cycle.entry.avgFillPrice ?? cycle.entry.price;
    if (fillPrice === null) return;

    const closeSide = oppositeSide(this.settings.direction);
    const { gridStepPct, gridPolicy, tickSize } = this.settings;
    const others = this.activeClosePrices(cycle.id);
    let price = takeProfitPriceFor(this.settings.direction, fillPrice, this.settings.takeProfitPct, tickSize);

    if (!gridStepSatisfied(price, others, gridStepPct)) {
      if (gridPolicy === "defer") {
        if (cycle.deferred !== "grid_step") {
          this.log.warn({ cycleId: cycle.id, price, gridStepPct }, "take-profit deferred by grid step");
          this.events.emit("close_deferred", { cycleId: cycle.id, reason: "grid_step" });
        }
        cycle.deferred = "grid_step";
        return;
      }
      const shifted = adjustCloseOutward(price, others, gridStepPct, closeSide, tickSize);
      this.log.info({ cycleId: cycle.id, from: price, to: shifted, gridStepPct }, "take-profit shifted outward by grid step");
      price = shifted;
    }

    const request: PlaceOrderRequest = {
      instrument: this.settings.instrument,
      side: closeSide,
      type: "limit",
      price,
      qty: cycle.entry.filledQty,
      role: "take_profit",
      reduceOnly: true
    };

    let handle: OrderHandle;
    try {
      handle = await this.submit(request, "take_profit");
    } catch (error) {
      const err = errorMessage(error);
      this.log.error({ err, cycleId: cycle.id, price }, "take-profit submission failed; close deferred");
      if (cycle.deferred !== "submit_failed") {
        safeNotify(
          this.notifier,
          this.log,
          "critical",
          `Take-profit for ${this.settings.instrument} @ ${price} could not be placed on ${this.venue}: ${err}`
        );
        this.events.emit("close_deferred", { cycleId: cycle.id, reason: "submit_failed" });
      }
      cycle.deferred = "submit_failed";
      return;
    }

    const close = toOrder(handle, request, this.now());
    cycle.close = close;
    cycle.deferred = null;
    cycle.phase = "close_pending";
    this.orderIndex.set(close.id, { cycleId: cycle.id, kind: "close" });

    this.log.info({ cycleId: cycle.id, orderId: close.id, side: closeSide, price, qty: close.qty }, "take-profit placed");
    this.events.emit("close_placed", { cycleId: cycle.id, entryOrderId: cycle.entry.id, order: { ...close } });
  }

  private async settleCancelledEntry(cycle: EntryCycle, reason: string): Promise<void> {
    if (cycle.entry.filledQty > QTY_EPSILON) {
      this.log.info({ cycleId: cycle.id, filledQty: cycle.entry.filledQty, reason }, "partial entry kept");
      await this.onEntryFilled({ ...cycle.entry });
      return;
    }

    cycle.phase = "closed";
    this.release(cycle);
    this.lastCloseCount = Math.max(0, this.lastCloseCount - 1);
    this.lastEntryAt = null;
    this.clearCooldownTimer();
    this.log.info({ cycleId: cycle.id, reason }, "entry cancelled without fill");
    this.events.emit("entry_cancelled", { cycleId: cycle.id, order: { ...cycle.entry } });
  }

  private requeueClose(cycle: EntryCycle, reason: CloseDeferral): void {
    if (!cycle.close) return;
    const executed = cycle.close.filledQty;
    if (executed > QTY_EPSILON) {
      cycle.entry = { ...cycle.entry, filledQty: Math.max(0, cycle.entry.filledQty - executed) };
    }
    this.orderIndex.delete(cycle.close.id);
    cycle.close = null;
    cycle.phase = "position_open";
    cycle.deferred = reason;
    this.events.emit("close_deferred", { cycleId: cycle.id, reason });
  }

  private async submit(request: PlaceOrderRequest, label: string): Promise<OrderHandle> {
    return withRetry(() => this.exchange.placeOrder(request), {
      attempts: this.settings.orderRetryAttempts,
      baseDelayMs: this.settings.retryBaseDelayMs,
      sleep: this.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        this.log.warn({ err: errorMessage(error), attempt, delayMs, order: label }, "order submission retry");
      }
    });
  }

  private async cancelQuietly(order: Order, reason: string): Promise<boolean> {
    if (isTerminalStatus(order.status)) return false;
    try {
      const result = await withRetry(
        () => this.exchange.cancelOrder({ orderId: order.id, venue: order.venue, instrument: order.instrument }),
        { attempts: this.settings.orderRetryAttempts, baseDelayMs: this.settings.retryBaseDelayMs, sleep: this.sleep }
      );
      if (result.filledQty > order.filledQty + QTY_EPSILON) await this.reconcileFill(order, result.filledQty);
      if (result.ok) order.status = "cancelled";
      this.log.info({ orderId: order.id, role: order.role, filledQty: order.filledQty, ok: result.ok, reason }, "order cancelled");
      return result.ok;
    } catch (error) {
      this.log.error({ err: errorMessage(error), orderId: order.id, reason }, "cancel failed");
      return false;
    }
  }

  /** Fill seen only in a cancel result: price it from the venue, else at the limit price. */
  private async reconcileFill(order: Order, filledQty: number): Promise<void> {
    order.filledQty = filledQty;
    try {
      const venueOrder = await withRetry(
        () => this.exchange.getOrder({ orderId: order.id, venue: order.venue, instrument: order.instrument }),
        { attempts: this.settings.orderRetryAttempts, baseDelayMs: this.settings.retryBaseDelayMs, sleep: this.sleep }
      );
      if (venueOrder) {
        order.filledQty = Math.max(filledQty, venueOrder.filledQty);
        order.fee = venueOrder.fee;
        if (venueOrder.avgFillPrice !== null) order.avgFillPrice = venueOrder.avgFillPrice;
      }
    } catch (error) {
      this.log.warn({ err: errorMessage(error), orderId: order.id }, "fill price lookup failed; using the limit price");
    }
    if (order.avgFillPrice === null) order.avgFillPrice = order.price;
  }

  private startCooldownTimer(ms: number): void {
    this.clearCooldownTimer();
    if (!(ms > 0)) return;
    this.cooldownTimer = setTimeout(() => {
      this.cooldownTimer = null;
      this.events.emit("cooldown_elapsed", { at: this.now() });
    }, ms);
    this.cooldownTimer.unref();
  }

  private clearCooldownTimer(): void {
    if (!this.cooldownTimer) return;
    clearTimeout(this.cooldownTimer);
    this.cooldownTimer = null;
  }

  private currentWaitMs(): number {
    const { waitTimeMs, adaptiveWaitTime, maxOrders } = this.settings;
    return adaptiveWaitTime ? scaledWaitMs(waitTimeMs, this.activeCloseCount(), maxOrders) : waitTimeMs;
  }

  private cooldownRemainingMs(): number {
    if (this.settings.adaptiveWaitTime) {
      const closes = this.activeCloseCount();
      if (closes < this.lastCloseCount) {
        this.lastCloseCount = closes;
        return 0;
      }
      this.lastCloseCount = closes;
    }
    if (this.lastEntryAt === null) return 0;
    return Math.max(0, this.lastEntryAt + this.currentWaitMs() - this.now());
  }

  private stopPriceBreached(quote: MarketQuote): boolean {
    const { stopPrice, direction } = this.settings;
    if (stopPrice === null) return false;
    return direction === "buy" ? quote.ask >= stopPrice : quote.bid <= stopPrice;
  }

  private reject(reason: EntryRejection): EntryResult {
    this.log.debug({ reason }, "entry rejected");
    return { status: "rejected", reason };
  }

  private cycleFor(orderId: string, kind: OrderRef["kind"]): EntryCycle | undefined {
    const ref = this.orderIndex.get(orderId);
    if (!ref || ref.kind !== kind) return undefined;
    return this.cycles.get(ref.cycleId);
  }

  private pendingEntry(): EntryCycle | undefined {
    return this.activeCycles().find((cycle) => cycle.phase === "entry_pending");
  }

  private activeCycles(): EntryCycle[] {
    return [...this.cycles.values()].filter((cycle) => cycle.phase !== "closed" && cycle.phase !== "idle");
  }

  private activeOrderCount(): number {
    return this.activeCycles().length;
  }

  private activeCloseCount(): number {
    return this.activeCycles().filter((cycle) => cycle.phase === "close_pending").length;
  }

  private activeClosePrices(excludeCycleId?: number): number[] {
    const prices: number[] = [];
    for (const cycle of this.activeCycles()) {
      if (cycle.id === excludeCycleId || cycle.phase !== "close_pending" || cycle.close?.price == null) continue;
      prices.push(cycle.close.price);
    }
    return prices;
  }

  private release(cycle: EntryCycle): void {
    this.cycles.delete(cycle.id);
    this.orderIndex.delete(cycle.entry.id);
    if (cycle.close) this.orderIndex.delete(cycle.close.id);
  }
}

function isUsableQuote(quote: MarketQuote): boolean {
  return Number.isFinite(quote.bid) && Number.isFinite(quote.ask) && quote.bid > 0 && quote.ask > 0 && quote.bid < quote.ask;
}

function toOrder(handle: OrderHandle, request: PlaceOrderRequest, createdAt: number): Order {
  return {
    id: handle.orderId,
    venue: handle.venue,
    instrument: handle.instrument,
    side: request.side,
    role: request.role,
    type: request.type,
    price: request.price ?? null,
    qty: request.qty,
    filledQty: 0,
    avgFillPrice: null,
    fee: 0,
    status: "open",
    createdAt
  };
}

function applyUpdate(order: Order, update: OrderUpdate): void {
  order.filledQty = Math.max(order.filledQty, update.fillQty);
  if (update.fillPrice !== null) order.avgFillPrice = update.fillPrice;
  if (update.fee !== undefined) order.fee = update.fee;
  order.status = update.status;
}
