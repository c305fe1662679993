import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export type Frozen<T> = { readonly [K in keyof T]: T[K] extends object ? Frozen<T[K]> : T[K] };

const positive = () => z.number().finite().positive();
const nonNegative = () => z.number().finite().min(0);
const positiveInt = () => z.number().int().positive();
const optionalPositive = () => z.number().finite().positive().nullable().default(null);

export const drawdownConfigSchema = z.object({
  enabled: z.boolean().default(false),
  /** Percent of session peak. */
  lightPct: positive().default(5),
  mediumPct: positive().default(8),
  severePct: positive().max(100).default(12),
  smoothingWindow: positiveInt().default(3),
  pollIntervalMs: positiveInt().default(15_000),
  cacheDurationMs: positiveInt().default(60_000),
  strictMode: z.boolean().default(false)
});

export const hedgeConfigSchema = z.object({
  enabled: z.boolean().default(false),
  exchange: z.string().trim().min(1).nullable().default(null),
  instrument: z.string().trim().min(1).nullable().default(null),
  delayMs: nonNegative().default(0),
  retryAttempts: positiveInt().default(3),
  /** How often at-risk hedges are re-driven; 0 leaves them to the operator. */
  retryIntervalMs: z.number().int().min(0).default(60_000)
});

export const stopLossConfigSchema = z.object({
  pollIntervalMs: positiveInt().default(5_000),
  maxRetries: positiveInt().default(10)
});

export const tradingConfigSchema = z
  .object({
    exchange: z.string().trim().min(1),
    instrument: z.string().trim().min(1),
    quantity: positive(),
    tickSize: positive(),
    direction: z.enum(["buy", "sell"]),
    /** Percent distance of the take-profit from the entry fill. */
    takeProfitPct: positive(),
    /** Minimum percent spacing between active close prices; <= 0 disables. */
    gridStepPct: z.number().finite().default(-100),
    gridPolicy: z.enum(["shift", "defer"]).default("shift"),
    waitTimeMs: nonNegative(),
    adaptiveWaitTime: z.boolean().default(false),
    maxOrders: positiveInt(),
    stopPrice: optionalPositive(),
    pausePrice: optionalPositive(),
    /** Unrealized loss as a percent of used margin that stops trading once every slot is in use. */
    maxLossPct: optionalPositive(),
    tickIntervalMs: positiveInt().default(1_000),
    orderRetryAttempts: positiveInt().default(3),
    retryBaseDelayMs: nonNegative().default(500),
    drawdown: drawdownConfigSchema.default({}),
    hedge: hedgeConfigSchema.default({}),
    stopLoss: stopLossConfigSchema.default({})
  })
  .superRefine((cfg, ctx) => {
    const { lightPct, mediumPct, severePct } = cfg.drawdown;
    if (!(lightPct < mediumPct && mediumPct < severePct)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["drawdown"],
        message: `drawdown thresholds must satisfy light < medium < severe (got ${lightPct} / ${mediumPct} / ${severePct})`
      });
    }

    const { direction, pausePrice, stopPrice } = cfg;
    if (pausePrice !== null && stopPrice !== null) {
      const ordered = direction === "buy" ? pausePrice <= stopPrice : pausePrice >= stopPrice;
      if (!ordered) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["pausePrice"],
          message: `pause price must be reached before the stop price when trading ${direction} (got pause ${pausePrice}, stop ${stopPrice})`
        });
      }
    }

    if (cfg.hedge.enabled && !cfg.hedge.exchange) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["hedge", "exchange"],
        message: "hedge exchange is required when hedging is enabled"
      });
    }

    if (cfg.hedge.enabled && cfg.hedge.exchange === cfg.exchange) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["hedge", "exchange"],
        message: "hedge exchange must differ from the primary exchange"
      });
    }
  });

export type TradingConfigInput = z.input<typeof tradingConfigSchema>;
export type TradingConfig = Frozen<z.output<typeof tradingConfigSchema>>;
export type DrawdownConfig = TradingConfig["drawdown"];
export type HedgeConfig = TradingConfig["hedge"];
export type StopLossConfig = TradingConfig["stopLoss"];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export function loadTradingConfig(input: unknown): TradingConfig {
  const parsed = tradingConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid trading configuration: ${issues.join("; ")}`, issues);
  }
  return deepFreeze(parsed.data);
}

type Env = Record<string, string | undefined>;

function raw(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, key: string): number | undefined {
  const value = raw(env, key);
  return value === undefined ? undefined : Number(value);
}

function readSecondsAsMs(env: Env, key: string): number | undefined {
  const value = readNumber(env, key);
  return value === undefined ? undefined : Math.round(value * 1000);
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const value = raw(env, key)?.toLowerCase();
  if (value === undefined) return undefined;
  if (value === "true" || value === "1" || value === "on" || value === "yes") return true;
  if (value === "false" || value === "0" || value === "off" || value === "no") return false;
  throw new ConfigurationError(`${key} must be a boolean (got "${value}")`, [`${key}: not a boolean`]);
}

/** `-1` and empty disable the gate. */
function readOptionalLimit(env: Env, key: string): number | null {
  const value = readNumber(env, key);
  if (value === undefined || value === -1) return null;
  return value;
}

export function readTradingConfigFromEnv(env: Env = process.env): TradingConfig {
  return loadTradingConfig({
    exchange: raw(env, "EXCHANGE"),
    instrument: raw(env, "INSTRUMENT"),
    quantity: readNumber(env, "QUANTITY"),
    tickSize: readNumber(env, "TICK_SIZE"),
    direction: raw(env, "DIRECTION")?.toLowerCase(),
    takeProfitPct: readNumber(env, "TAKE_PROFIT"),
    gridStepPct: readNumber(env, "GRID_STEP"),
    gridPolicy: raw(env, "GRID_POLICY")?.toLowerCase(),
    waitTimeMs: readSecondsAsMs(env, "WAIT_TIME"),
    adaptiveWaitTime: readBoolean(env, "ADAPTIVE_WAIT_TIME"),
    maxOrders: readNumber(env, "MAX_ORDERS"),
    stopPrice: readOptionalLimit(env, "STOP_PRICE"),
    pausePrice: readOptionalLimit(env, "PAUSE_PRICE"),
    maxLossPct: readOptionalLimit(env, "MAX_LOSS_PCT"),
    tickIntervalMs: readNumber(env, "TICK_INTERVAL_MS"),
    orderRetryAttempts: readNumber(env, "ORDER_RETRY_ATTEMPTS"),
    retryBaseDelayMs: readNumber(env, "RETRY_BASE_DELAY_MS"),
    drawdown: {
      enabled: readBoolean(env, "ENABLE_DRAWDOWN_MONITOR"),
      lightPct: readNumber(env, "DRAWDOWN_LIGHT_THRESHOLD"),
      mediumPct: readNumber(env, "DRAWDOWN_MEDIUM_THRESHOLD"),
      severePct: readNumber(env, "DRAWDOWN_SEVERE_THRESHOLD"),
      smoothingWindow: readNumber(env, "DRAWDOWN_SMOOTHING_WINDOW"),
      pollIntervalMs: readSecondsAsMs(env, "DRAWDOWN_POLL_INTERVAL"),
      cacheDurationMs: readSecondsAsMs(env, "CACHE_DURATION"),
      strictMode: readBoolean(env, "STRICT_MODE")
    },
    hedge: {
      enabled: readBoolean(env, "ENABLE_HEDGE"),
      exchange: raw(env, "HEDGE_EXCHANGE") ?? null,
      instrument: raw(env, "HEDGE_INSTRUMENT") ?? null,
      delayMs: readSecondsAsMs(env, "HEDGE_DELAY"),
      retryAttempts: readNumber(env, "HEDGE_RETRY_ATTEMPTS"),
      retryIntervalMs: readSecondsAsMs(env, "HEDGE_RETRY_INTERVAL")
    },
    stopLoss: {
      pollIntervalMs: readSecondsAsMs(env, "STOP_LOSS_POLL_INTERVAL"),
      maxRetries: readNumber(env, "STOP_LOSS_MAX_RETRIES")
    }
  });
}
