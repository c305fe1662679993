import {
  MonitoringError,
  ValidationError,
  average,
  createLogger,
  errorMessage,
  safeNotify,
  type DrawdownConfig,
  type Logger,
  type Notifier
} from "@hedgegrid/core";
import { NetWorthCache, type CachedNetWorth } from "./net-worth-cache.js";
import { classifyDrawdown, computeDrawdownPct, tierRank, type DrawdownTier } from "./tiers.js";

export type DrawdownSettings = Pick<
  DrawdownConfig,
  "lightPct" | "mediumPct" | "severePct" | "smoothingWindow" | "pollIntervalMs" | "cacheDurationMs" | "strictMode"
>;

/** Where the value of one evaluation came from. */
export type SampleOrigin = "live" | "cached" | "stale";

export type DrawdownHooks = {
  /** Called with true on entering medium (or worse) and false when dropping below it. */
  pauseEntries?: (paused: boolean) => void;
  triggerStopLoss?: (reason: string) => void | Promise<unknown>;
};

export type DrawdownMonitorOptions = {
  settings: DrawdownSettings;
  fetchNetWorth: () => Promise<number>;
  hooks?: DrawdownHooks;
  notifier?: Notifier;
  log?: Logger;
  now?: () => number;
};

export type DrawdownEvaluation = {
  origin: SampleOrigin;
  raw: number;
  smoothed: number;
  peak: number;
  drawdownPct: number;
  tier: DrawdownTier;
  previousTier: DrawdownTier;
};

export type PollResult =
  | { status: "evaluated"; evaluation: DrawdownEvaluation }
  | { status: "skipped"; reason: "terminated" }
  | { status: "skipped"; reason: "no_cache" | "stale_cache"; error: MonitoringError };

export type DrawdownStatus = {
  tier: DrawdownTier;
  raw: number | null;
  smoothed: number | null;
  peak: number | null;
  drawdownPct: number;
  samples: number;
  lastOrigin: SampleOrigin | null;
  cache: CachedNetWorth | null;
  running: boolean;
  terminated: boolean;
};

export function validateNetWorthSample(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`net worth sample must be a positive finite number (got ${String(value)})`, value);
  }
  return value;
}

/**
 * Smooths net worth samples, tracks the session peak and escalates through the
 * drawdown tiers. Peak, window and cache belong to this instance only.
 */
export class DrawdownMonitor {
  private readonly settings: DrawdownSettings;
  private readonly fetchNetWorth: () => Promise<number>;
  private readonly hooks: DrawdownHooks;
  private readonly notifier?: Notifier;
  private readonly log: Logger;
  private readonly cache: NetWorthCache;

  private readonly window: number[] = [];
  private peak: number | null = null;
  private raw: number | null = null;
  private smoothed: number | null = null;
  private drawdownPct = 0;
  private tier: DrawdownTier = "none";
  private samples = 0;
  private lastOrigin: SampleOrigin | null = null;
  private staleWarned = false;

  private running = false;
  private terminated = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: DrawdownMonitorOptions) {
    this.settings = options.settings;
    this.fetchNetWorth = options.fetchNetWorth;
    this.hooks = options.hooks ?? {};
    this.notifier = options.notifier;
    this.log = options.log ?? createLogger("drawdown-monitor");
    this.cache = new NetWorthCache(options.settings.cacheDurationMs, options.now);
  }

  /** Push path. Invalid samples throw `ValidationError` and leave state untouched. */
  ingest(value: number): DrawdownEvaluation | null {
    if (this.terminated) return null;
    const sample = validateNetWorthSample(value);
    this.cache.store(sample);
    this.staleWarned = false;
    return this.evaluate(sample, "live");
  }

  /** Pull path: one fetch with cache fallback. */
  async poll(): Promise<PollResult> {
    if (this.terminated) return { status: "skipped", reason: "terminated" };

    let sample: number;
    try {
      sample = validateNetWorthSample(await this.fetchNetWorth());
    } catch (error) {
      return this.fallback(new MonitoringError(`net worth fetch failed: ${errorMessage(error)}`, error));
    }

    if (this.terminated) return { status: "skipped", reason: "terminated" };
    this.cache.store(sample);
    if (this.staleWarned) {
      this.log.info({ netWorth: sample }, "live net worth restored");
      this.staleWarned = false;
    }
    return { status: "evaluated", evaluation: this.evaluate(sample, "live") };
  }

  start(): void {
    if (this.running || this.terminated) return;
    this.running = true;
    this.log.info({ pollIntervalMs: this.settings.pollIntervalMs }, "drawdown monitor started");
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isTerminated(): boolean {
    return this.terminated;
  }

  getStatus(): DrawdownStatus {
    return {
      tier: this.tier,
      raw: this.raw,
      smoothed: this.smoothed,
      peak: this.peak,
      drawdownPct: this.drawdownPct,
      samples: this.samples,
      lastOrigin: this.lastOrigin,
      cache: this.cache.read(),
      running: this.running,
      terminated: this.terminated
    };
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.cycle();
    }, delayMs);
  }

  private async cycle(): Promise<void> {
    try {
      await this.poll();
    } catch (error) {
      this.log.error({ err: errorMessage(error) }, "drawdown cycle failed");
    } finally {
      if (this.running && !this.terminated) this.schedule(this.settings.pollIntervalMs);
    }
  }

  private fallback(error: MonitoringError): PollResult {
    const cached = this.cache.read();
    const err = errorMessage(error.cause);

    if (!cached) {
      this.log.warn({ err }, "net worth fetch failed with no cached sample; cycle skipped");
      return { status: "skipped", reason: "no_cache", error };
    }

    if (cached.fresh) {
      this.log.warn({ err, ageMs: cached.ageMs }, "net worth fetch failed; using cached sample");
      return { status: "evaluated", evaluation: this.evaluate(cached.value, "cached") };
    }

    if (this.settings.strictMode) {
      this.log.warn(
        { err, ageMs: cached.ageMs, cacheDurationMs: this.settings.cacheDurationMs },
        "net worth fetch failed and cache is stale; strict mode skips the cycle"
      );
      return { status: "skipped", reason: "stale_cache", error };
    }

    this.log.error(
      { err, ageMs: cached.ageMs, cacheDurationMs: this.settings.cacheDurationMs },
      "net worth fetch failed; REUSING STALE cached sample (tolerant mode)"
    );
    if (!this.staleWarned) {
      this.staleWarned = true;
      safeNotify(
        this.notifier,
        this.log,
        "warning",
        `Drawdown monitor is running on a stale net worth (${Math.round(cached.ageMs / 1000)}s old): ${err}`
      );
    }
    return { status: "evaluated", evaluation: this.evaluate(cached.value, "stale") };
  }

  private evaluate(raw: number, origin: SampleOrigin): DrawdownEvaluation {
    this.window.push(raw);
    while (this.window.length > this.settings.smoothingWindow) this.window.shift();

    const smoothed = average(this.window);
    if (this.peak === null || smoothed > this.peak) {
      if (this.peak !== null) this.log.info({ peak: smoothed, previousPeak: this.peak }, "new session peak");
      this.peak = smoothed;
    }

    const drawdownPct = computeDrawdownPct(this.peak, smoothed);
    const previousTier = this.tier;
    const tier = classifyDrawdown(drawdownPct, this.settings);

    this.raw = raw;
    this.smoothed = smoothed;
    this.drawdownPct = drawdownPct;
    this.tier = tier;
    this.samples += 1;
    this.lastOrigin = origin;

    this.log.debug({ raw, smoothed, peak: this.peak, drawdownPct, tier, origin }, "net worth sample");

    const evaluation: DrawdownEvaluation = { origin, raw, smoothed, peak: this.peak, drawdownPct, tier, previousTier };
    if (tier !== previousTier) this.onTransition(evaluation);
    return evaluation;
  }

  private onTransition(evaluation: DrawdownEvaluation): void {
    const { previousTier, tier, drawdownPct } = evaluation;
    const pct = drawdownPct.toFixed(2);
    const meta = { from: previousTier, to: tier, drawdownPct, peak: evaluation.peak, smoothed: evaluation.smoothed };
    const mediumRank = tierRank("medium");

    if (tierRank(tier) >= mediumRank && tierRank(previousTier) < mediumRank) {
      this.callHook("pauseEntries", () => this.hooks.pauseEntries?.(true));
    }
    if (tierRank(tier) < mediumRank && tierRank(previousTier) >= mediumRank) {
      this.callHook("pauseEntries", () => this.hooks.pauseEntries?.(false));
    }

    switch (tier) {
      case "none":
        this.log.info(meta, "drawdown recovered");
        safeNotify(this.notifier, this.log, "info", `Drawdown recovered to ${pct}%`);
        return;
      case "light":
        this.log.warn(meta, "drawdown light");
        safeNotify(this.notifier, this.log, "warning", `Drawdown ${pct}% reached the light tier`);
        return;
      case "medium":
        this.log.warn(meta, "drawdown medium; new entries paused");
        safeNotify(this.notifier, this.log, "warning", `Drawdown ${pct}% reached the medium tier; new entries paused`);
        return;
      case "severe":
        this.log.error(meta, "drawdown severe; triggering stop-loss");
        safeNotify(this.notifier, this.log, "critical", `Drawdown ${pct}% reached the severe tier; stop-loss triggered`);
        this.terminate(`drawdown ${pct}% reached severe threshold ${this.settings.severePct}%`);
        return;
    }
  }

  private terminate(reason: string): void {
    this.terminated = true;
    this.stop();

    const trigger = this.hooks.triggerStopLoss;
    if (!trigger) return;
    try {
      const pending = trigger(reason);
      if (pending instanceof Promise) {
        void pending.catch((error: unknown) => {
          this.log.error({ err: errorMessage(error) }, "stop-loss trigger failed");
        });
      }
    } catch (error) {
      this.log.error({ err: errorMessage(error) }, "stop-loss trigger failed");
    }
  }

  private callHook(name: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.log.error({ err: errorMessage(error), hook: name }, "drawdown hook failed");
    }
  }
}
