import type { CoverageReportParser } from './types.js';
import { findElementAttributes, intAttr } from './xml.js';

/** Cobertura XML: totals live on the root `<coverage lines-valid lines-covered>`. */
export const coberturaParser: CoverageReportParser = {
  format: 'cobertura',
  parse(content) {
    const root = findElementAttributes(content, 'coverage');
    if (!root) return null;
    const total = intAttr(root, 'lines-valid');
    const covered = intAttr(root, 'lines-covered');
    if (total === null || covered === null) return null;
    return { covered, total };
  }
};
