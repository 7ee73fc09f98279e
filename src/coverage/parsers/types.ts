import type { CoverageTotals } from '../record.js';

export type ReportFormat = 'tabular' | 'json-summary' | 'cobertura' | 'jacoco' | 'go-profile' | 'lcov';

export interface CoverageReportParser {
  readonly format: ReportFormat;
  /** Returns null when the document carries no recognizable totals. */
  parse(content: string): CoverageTotals | null;
}
