import type { CoverageReportParser } from './types.js';

/**
 * LCOV tracefile. Per record, `LF`/`LH` win when present; otherwise `DA` lines
 * are counted.
 */
export const lcovParser: CoverageReportParser = {
  format: 'lcov',
  parse(content) {
    let total = 0;
    let covered = 0;
    let records = 0;

    let lf: number | null = null;
    let lh: number | null = null;
    let daTotal = 0;
    let daCovered = 0;

    for (const raw of content.split('\n')) {
      const line = raw.trim();
      if (line.startsWith('LF:')) {
        lf = Number.parseInt(line.slice(3), 10);
      } else if (line.startsWith('LH:')) {
        lh = Number.parseInt(line.slice(3), 10);
      } else if (line.startsWith('DA:')) {
        const hits = Number.parseInt(line.slice(3).split(',')[1] ?? '', 10);
        daTotal += 1;
        if (hits > 0) daCovered += 1;
      } else if (line === 'end_of_record') {
        if (lf !== null && lh !== null && !Number.isNaN(lf) && !Number.isNaN(lh)) {
          total += lf;
          covered += lh;
        } else {
          total += daTotal;
          covered += daCovered;
        }
        records += 1;
        lf = null;
        lh = null;
        daTotal = 0;
        daCovered = 0;
      }
    }

    return records > 0 ? { covered, total } : null;
  }
};
