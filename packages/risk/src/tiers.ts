export type DrawdownTier = "none" | "light" | "medium" | "severe";

export type DrawdownThresholds = {
  lightPct: number;
  mediumPct: number;
  severePct: number;
};

const TIER_RANK: Record<DrawdownTier, number> = {
  none: 0,
  light: 1,
  medium: 2,
  severe: 3
};

export function tierRank(tier: DrawdownTier): number {
  return TIER_RANK[tier];
}

/** Thresholds are inclusive lower bounds. */
export function classifyDrawdown(drawdownPct: number, thresholds: DrawdownThresholds): DrawdownTier {
  if (drawdownPct >= thresholds.severePct) return "severe";
  if (drawdownPct >= thresholds.mediumPct) return "medium";
  if (drawdownPct >= thresholds.lightPct) return "light";
  return "none";
}

export function computeDrawdownPct(peak: number, value: number): number {
  if (!(peak > 0) || value >= peak) return 0;
  return ((peak - value) * 100) / peak;
}
