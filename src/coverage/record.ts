import { emptyByLayer, LAYERS, type Layer } from '../classification/types.js';

/** Raw line counts as reported by a coverage tool. */
export interface CoverageTotals {
  covered: number;
  total: number;
}

export interface CoverageRecord {
  readonly covered: number;
  readonly total: number;
  /** covered / total × 100 clamped to [0, 100]; 0 when total is 0. */
  readonly percentage: number;
}

/**
 * The only way to build a CoverageRecord: the percentage is always derived
 * from the counts it travels with.
 */
export function coverageRecord(covered: number, total: number): CoverageRecord {
  const t = sanitize(total);
  const c = Math.min(sanitize(covered), t);
  const percentage = t > 0 ? Math.min(100, Math.max(0, (c / t) * 100)) : 0;
  return Object.freeze({ covered: c, total: t, percentage });
}

export function addTotals(a: CoverageTotals, b: CoverageTotals): CoverageTotals {
  return { covered: a.covered + b.covered, total: a.total + b.total };
}

export function zeroTotals(): CoverageTotals {
  return { covered: 0, total: 0 };
}

export function recordsByLayer(totals: Record<Layer, CoverageTotals>): Record<Layer, CoverageRecord> {
  const out = emptyByLayer(() => coverageRecord(0, 0));
  for (const layer of LAYERS) {
    out[layer] = coverageRecord(totals[layer].covered, totals[layer].total);
  }
  return out;
}

function sanitize(n: number): number {
  return Number.isFinite(n) && n > 0 ? n : 0;
}
