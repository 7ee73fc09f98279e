import type { CoverageReportParser } from './types.js';
import { allElementAttributes, intAttr } from './xml.js';

/**
 * JaCoCo XML. Report-level counters are the `<counter>` elements that follow the
 * last `</package>`; package, class and method counters come before it.
 */
export const jacocoParser: CoverageReportParser = {
  format: 'jacoco',
  parse(content) {
    if (!/<report\b/.test(content)) return null;
    const lastPackageEnd = content.lastIndexOf('</package>');
    const counters = allElementAttributes(content, 'counter', lastPackageEnd === -1 ? 0 : lastPackageEnd);
    const line = counters.find((c) => c.type === 'LINE');
    if (!line) return null;
    const missed = intAttr(line, 'missed');
    const covered = intAttr(line, 'covered');
    if (missed === null || covered === null) return null;
    return { covered, total: covered + missed };
  }
};
