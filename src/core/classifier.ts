import type { Classification, Thresholds, Tier } from '../types/index.js';

/** Fraction of the high threshold at which a value turns "warn" */
export const WARN_RATIO = 0.85;

/** xterm-256 foreground per tier */
export const TIER_COLORS: Record<Tier, number> = {
  ok: 78,        // soft green
  warn: 220,     // yellow
  high: 208,     // orange
  critical: 196, // red
};

/**
 * Classify a value against optional thresholds.
 * Tiers are checked critical, high, warn, ok; each lower bound is inclusive.
 */
export function classify(value: number, thresholds: Thresholds = {}): Classification {
  const { high, critical } = thresholds;

  if (critical !== undefined && value >= critical) {
    return { tier: 'critical', emphasis: true };
  }
  if (high !== undefined && value >= high) {
    return { tier: 'high', emphasis: false };
  }
  if (high !== undefined && value >= high * WARN_RATIO) {
    return { tier: 'warn', emphasis: false };
  }
  return { tier: 'ok', emphasis: false };
}

export function tierColor(tier: Tier): number {
  return TIER_COLORS[tier];
}
