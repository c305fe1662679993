import {
  ConfigurationError,
  createLogger,
  errorMessage,
  safeNotify,
  type Logger,
  type Notifier,
  type TradingConfig
} from "@hedgegrid/core";
import { sleep, type ExchangeClient } from "@hedgegrid/exchange";
import { DrawdownMonitor, type DrawdownStatus } from "@hedgegrid/risk";
import { HedgeCoordinator, type HedgeStatus } from "./hedge-coordinator.js";
import { OrderLifecycleManager, type LifecycleStatus } from "./order-lifecycle.js";
import { TradingSlot } from "./slot.js";
import { StopLossExecutor, type FlattenTarget, type StopLossReport } from "./stop-loss.js";

export type SessionState = "idle" | "running" | "stopping" | "stopped" | "failed";

export type SessionOutcome = {
  state: "stopped" | "failed";
  reason: string;
  report: StopLossReport | null;
};

export type SessionStatus = {
  state: SessionState;
  startedAt: number | null;
  stoppedAt: number | null;
  reason: string | null;
  slot: ReturnType<TradingSlot["getStatus"]>;
  lifecycle: LifecycleStatus;
  hedge: HedgeStatus | null;
  drawdown: DrawdownStatus | null;
  stopLoss: StopLossReport | null;
};

export type TradingSessionOptions = {
  config: TradingConfig;
  primary: ExchangeClient;
  /** Required when `config.hedge.enabled`. */
  hedge?: ExchangeClient | null;
  notifier?: Notifier;
  log?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Wires one strategy instance: the order lifecycle behind its slot, the
 * optional hedge, the drawdown monitor and the stop-loss that ends the session.
 */
export class TradingSession {
  readonly lifecycle: OrderLifecycleManager;
  readonly slot: TradingSlot;
  readonly hedge: HedgeCoordinator | null;
  readonly monitor: DrawdownMonitor | null;
  readonly stopLoss: StopLossExecutor;
  readonly done: Promise<SessionOutcome>;

  private readonly config: TradingConfig;
  private readonly primary: ExchangeClient;
  private readonly hedgeExchange: ExchangeClient | null;
  private readonly hedgeInstrument: string;
  private readonly log: Logger;
  private readonly notifier?: Notifier;
  private readonly now: () => number;

  private state: SessionState = "idle";
  private startedAt: number | null = null;
  private stoppedAt: number | null = null;
  private reason: string | null = null;
  private report: StopLossReport | null = null;
  private stopLossRun: Promise<StopLossReport> | null = null;
  private resolveDone: (outcome: SessionOutcome) => void = () => undefined;

  constructor(options: TradingSessionOptions) {
    const { config } = options;
    this.config = config;
    this.primary = options.primary;
    this.notifier = options.notifier;
    this.now = options.now ?? (() => Date.now());
    this.log = options.log ?? createLogger("session", { venue: options.primary.venue, instrument: config.instrument });
    const pause = options.sleep ?? sleep;

    if (config.hedge.enabled && !options.hedge) {
      throw new ConfigurationError("hedging is enabled but no hedge exchange was supplied", ["hedge.exchange: missing client"]);
    }
    this.hedgeExchange = config.hedge.enabled ? options.hedge ?? null : null;
    this.hedgeInstrument = config.hedge.instrument ?? config.instrument;

    this.done = new Promise<SessionOutcome>((resolve) => {
      this.resolveDone = resolve;
    });

    this.lifecycle = new OrderLifecycleManager({
      settings: config,
      exchange: this.primary,
      log: this.log.child({ component: "order-lifecycle" }),
      notifier: this.notifier,
      now: this.now,
      sleep: pause,
      onStopRequested: (reason) => {
        void this.triggerStopLoss(reason);
      }
    });

    this.slot = new TradingSlot({
      exchange: this.primary,
      instrument: config.instrument,
      lifecycle: this.lifecycle,
      tickIntervalMs: config.tickIntervalMs,
      log: this.log.child({ component: "slot" })
    });

    this.hedge = this.hedgeExchange
      ? new HedgeCoordinator({
          exchange: this.hedgeExchange,
          instrument: this.hedgeInstrument,
          delayMs: config.hedge.delayMs,
          retryAttempts: config.hedge.retryAttempts,
          retryBaseDelayMs: config.retryBaseDelayMs,
          retryIntervalMs: config.hedge.retryIntervalMs,
          log: this.log.child({ component: "hedge-coordinator", hedgeVenue: this.hedgeExchange.venue }),
          notifier: this.notifier,
          now: this.now,
          sleep: pause
        })
      : null;

    this.monitor = config.drawdown.enabled
      ? new DrawdownMonitor({
          settings: config.drawdown,
          fetchNetWorth: () => this.fetchNetWorth(),
          hooks: {
            pauseEntries: (paused) => {
              void this.slot.enqueue(() => this.lifecycle.setPaused("drawdown", paused), "drawdown-pause");
            },
            triggerStopLoss: (reason) => this.triggerStopLoss(reason)
          },
          notifier: this.notifier,
          log: this.log.child({ component: "drawdown-monitor" }),
          now: this.now
        })
      : null;

    this.stopLoss = new StopLossExecutor({
      pollIntervalMs: config.stopLoss.pollIntervalMs,
      maxRetries: config.stopLoss.maxRetries,
      callRetryAttempts: config.orderRetryAttempts,
      callRetryBaseDelayMs: config.retryBaseDelayMs,
      log: this.log.child({ component: "stop-loss" }),
      notifier: this.notifier,
      sleep: pause
    });

    this.wireHedge();
  }

  getState(): SessionState {
    return this.state;
  }

  start(): void {
    if (this.state !== "idle") return;
    this.state = "running";
    this.startedAt = this.now();
    this.hedge?.start();
    this.slot.start();
    this.monitor?.start();
    this.log.info(
      {
        direction: this.config.direction,
        quantity: this.config.quantity,
        maxOrders: this.config.maxOrders,
        hedgeVenue: this.hedgeExchange?.venue ?? null,
        drawdown: this.config.drawdown.enabled
      },
      "session started"
    );
  }

  /**
   * Graceful shutdown: pending entries are cancelled, resting take-profits and
   * open positions are left as they are. Joins a stop-loss already running.
   */
  async stop(reason = "shutdown"): Promise<SessionOutcome> {
    if (this.stopLossRun) {
      await this.stopLossRun;
      return this.done;
    }
    if (this.state === "stopped" || this.state === "failed" || this.state === "stopping") return this.done;

    this.state = "stopping";
    this.log.info({ reason }, "session stopping");
    this.monitor?.stop();
    this.slot.stop();
    await this.lifecycle.stop(reason);
    await this.slot.idle();
    if (this.hedge) {
      await this.hedge.idle();
      this.hedge.stop();
    }
    this.lifecycle.dispose();
    this.finish("stopped", reason);
    return this.done;
  }

  /**
   * Flattens everything and ends the session. Every caller (stop price,
   * severe drawdown, operator) shares the same run.
   */
  triggerStopLoss(reason: string): Promise<StopLossReport> {
    if (this.stopLossRun) return this.stopLossRun;
    this.stopLossRun = this.runStopLoss(reason).catch((error: unknown) => {
      const err = errorMessage(error);
      this.log.fatal({ err, reason }, "stop-loss run failed");
      safeNotify(this.notifier, this.log, "critical", `STOP-LOSS FAILED: ${err}. Manual action required.`);
      const report: StopLossReport = { reason, allFlat: false, outcomes: [] };
      this.finish("failed", reason, report);
      return report;
    });
    return this.stopLossRun;
  }

  getStatus(): SessionStatus {
    return {
      state: this.state,
      startedAt: this.startedAt,
      stoppedAt: this.stoppedAt,
      reason: this.reason,
      slot: this.slot.getStatus(),
      lifecycle: this.lifecycle.getStatus(),
      hedge: this.hedge?.getStatus() ?? null,
      drawdown: this.monitor?.getStatus() ?? null,
      stopLoss: this.report
    };
  }

  private async runStopLoss(reason: string): Promise<StopLossReport> {
    this.state = "stopping";
    this.log.error({ reason }, "stop-loss triggered; flattening session");

    this.monitor?.stop();
    this.slot.stop();
    this.lifecycle.setStopLossActive(true);
    await this.lifecycle.stop(reason);
    await this.slot.idle();
    await this.lifecycle.cancelCloseOrders();

    if (this.hedge) {
      this.hedge.halt();
      await this.hedge.idle();
    }

    const report = await this.stopLoss.flatten(this.flattenTargets(), reason);

    if (this.hedge) {
      this.hedge.releaseAll(reason);
      this.hedge.stop();
    }
    this.lifecycle.dispose();
    this.finish(report.allFlat ? "stopped" : "failed", reason, report);
    return report;
  }

  private flattenTargets(): FlattenTarget[] {
    const targets: FlattenTarget[] = [];

    const position = this.lifecycle.openPosition();
    if (position.side !== null && position.netQty !== 0) {
      targets.push({
        label: "primary",
        exchange: this.primary,
        instrument: this.config.instrument,
        side: position.side,
        qty: Math.abs(position.netQty)
      });
    }

    if (this.hedge && this.hedgeExchange) {
      const exposure = this.hedge.openExposure();
      if (exposure !== 0) {
        targets.push({
          label: "hedge",
          exchange: this.hedgeExchange,
          instrument: this.hedgeInstrument,
          side: exposure > 0 ? "long" : "short",
          qty: Math.abs(exposure)
        });
      }
    }
    return targets;
  }

  private wireHedge(): void {
    const hedge = this.hedge;
    if (!hedge) return;

    this.lifecycle.events.on("entry_filled", ({ order }) => {
      if (order.avgFillPrice === null) return;
      hedge.onPrimaryFill({ orderId: order.id, side: order.side, qty: order.filledQty, price: order.avgFillPrice, fee: order.fee });
    });
    this.lifecycle.events.on("close_placed", ({ entryOrderId, order }) => {
      hedge.attachTakeProfit(entryOrderId, order.id);
    });
    this.lifecycle.events.on("take_profit_filled", ({ entryOrderId, order }) => {
      const price = order.avgFillPrice ?? order.price;
      if (price === null) return;
      hedge.onTakeProfitFilled(entryOrderId, { orderId: order.id, side: order.side, price, fee: order.fee });
    });
  }

  private async fetchNetWorth(): Promise<number> {
    const primaryWorth = await this.primary.getNetWorth();
    if (!this.hedgeExchange) return primaryWorth;
    return primaryWorth + (await this.hedgeExchange.getNetWorth());
  }

  private finish(state: SessionOutcome["state"], reason: string, report: StopLossReport | null = null): void {
    if (this.state === "stopped" || this.state === "failed") return;
    this.state = state;
    this.stoppedAt = this.now();
    this.reason = reason;
    this.report = report;
    if (state === "failed") this.log.fatal({ reason }, "session ended with open exposure");
    else this.log.info({ reason, flattened: report !== null }, "session stopped");
    this.resolveDone({ state, reason, report });
  }
}
