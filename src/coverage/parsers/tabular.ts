import type { CoverageTotals } from '../record.js';
import type { CoverageReportParser } from './types.js';

/**
 * Text summary tables of the `coverage report` kind:
 *
 *   Name           Stmts   Miss  Cover
 *   ----------------------------------
 *   app/core.py       40     10    75%
 *   ----------------------------------
 *   TOTAL             40     10    75%
 *
 * Totals come positionally from the TOTAL row: column 1 is the measurable line
 * count and column 2 the missed lines. Branch columns, when present, follow.
 * A table with a single file has no TOTAL row; its one data row stands in.
 */
export const tabularParser: CoverageReportParser = {
  format: 'tabular',
  parse(content) {
    const lines = content.split(/\r?\n/).map((l) => l.trim());
    const totalRow = lines.filter((l) => /^TOTAL\b/.test(l)).at(-1);
    if (totalRow) return countsFromRow(totalRow);

    const separator = lines.findIndex((l) => /^-{5,}$/.test(l));
    if (separator === -1) return null;
    const rows = lines
      .slice(separator + 1)
      .filter((l) => l && !/^-+$/.test(l))
      .map(countsFromRow)
      .filter((r): r is CoverageTotals => r !== null);
    return rows.length === 1 ? rows[0] : null;
  }
};

function countsFromRow(row: string): CoverageTotals | null {
  const cols = row.split(/\s+/);
  if (cols.length < 3) return null;
  const total = Number.parseInt(cols[1], 10);
  const missed = Number.parseInt(cols[2], 10);
  if (Number.isNaN(total) || Number.isNaN(missed)) return null;
  return { covered: Math.max(0, total - missed), total };
}
