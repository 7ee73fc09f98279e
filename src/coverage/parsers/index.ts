import type { CoverageTotals } from '../record.js';
import { coberturaParser } from './cobertura.js';
import { goProfileParser } from './go-profile.js';
import { jacocoParser } from './jacoco.js';
import { jsonSummaryParser } from './json-summary.js';
import { lcovParser } from './lcov.js';
import { tabularParser } from './tabular.js';
import type { CoverageReportParser, ReportFormat } from './types.js';

export type { CoverageReportParser, ReportFormat } from './types.js';

export const PARSERS: Readonly<Record<ReportFormat, CoverageReportParser>> = {
  tabular: tabularParser,
  'json-summary': jsonSummaryParser,
  cobertura: coberturaParser,
  jacoco: jacocoParser,
  'go-profile': goProfileParser,
  lcov: lcovParser
};

export function parseCoverageReport(format: ReportFormat, content: string): CoverageTotals | null {
  return PARSERS[format].parse(content);
}
