import { z } from 'zod';

import type { CoverageReportParser } from './types.js';

const Metric = z.object({
  total: z.number().nonnegative(),
  covered: z.number().nonnegative()
});

/** `coverage-summary.json` as written by istanbul's json-summary reporter. */
const SummarySchema = z.object({
  total: z.object({ lines: Metric })
});

export const jsonSummaryParser: CoverageReportParser = {
  format: 'json-summary',
  parse(content) {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return null;
    }
    const parsed = SummarySchema.safeParse(raw);
    if (!parsed.success) return null;
    const { total, covered } = parsed.data.total.lines;
    return { covered, total };
  }
};
