import { createServer, type Server } from "node:http";
import type { SessionState, SessionStatus } from "@hedgegrid/engine";

export type RunnerHealth = {
  ok: boolean;
  service: "runner";
  startedAt: number;
  uptimeMs: number;
  session: SessionState;
  reason: string | null;
  slot: string;
  lastTickAt: number | null;
  pausedBy: string[];
  activeOrders: number;
  completedCycles: number;
  drawdown: { tier: string; drawdownPct: number; peak: number | null } | null;
  hedge: { active: number; atRisk: number; completed: number; realizedPnl: number } | null;
};

export function getRunnerHealth(status: SessionStatus, startedAt: number, now = Date.now()): RunnerHealth {
  return {
    ok: status.state !== "failed",
    service: "runner",
    startedAt,
    uptimeMs: Math.max(0, now - startedAt),
    session: status.state,
    reason: status.reason,
    slot: status.slot.key,
    lastTickAt: status.slot.lastTickAt,
    pausedBy: status.lifecycle.pausedBy,
    activeOrders: status.lifecycle.activeOrders,
    completedCycles: status.lifecycle.completedCycles,
    drawdown: status.drawdown
      ? { tier: status.drawdown.tier, drawdownPct: status.drawdown.drawdownPct, peak: status.drawdown.peak }
      : null,
    hedge: status.hedge
      ? {
          active: status.hedge.active,
          atRisk: status.hedge.atRisk,
          completed: status.hedge.completed,
          realizedPnl: status.hedge.realizedPnl
        }
      : null
  };
}

export function healthResponse(url: string | undefined, health: RunnerHealth): { statusCode: number; body: string } {
  const path = (url ?? "/").split("?")[0];
  if (path !== "/health" && path !== "/") {
    return { statusCode: 404, body: JSON.stringify({ ok: false, error: "not_found" }) };
  }
  return { statusCode: health.ok ? 200 : 503, body: JSON.stringify(health) };
}

export function createHealthServer(getHealth: () => RunnerHealth): Server {
  return createServer((req, res) => {
    const { statusCode, body } = healthResponse(req.url, getHealth());
    res.statusCode = statusCode;
    res.setHeader("content-type", "application/json");
    res.end(body);
  });
}
