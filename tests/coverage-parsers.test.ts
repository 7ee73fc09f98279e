import { describe, expect, it } from 'vitest';

import { parseCoverageReport, PARSERS } from '../src/coverage/parsers/index.js';
import { coveragePyTable } from './fake-tool-runner.js';

describe('tabular parser', () => {
  it('reads totals positionally from the TOTAL row', () => {
    expect(parseCoverageReport('tabular', coveragePyTable(40, 10))).toEqual({ covered: 30, total: 40 });
  });

  it('ignores branch columns after the missed count', () => {
    const table = [
      'Name       Stmts   Miss Branch BrPart  Cover',
      '--------------------------------------------',
      'TOTAL         20      5      8      2    70%'
    ].join('\n');
    expect(parseCoverageReport('tabular', table)).toEqual({ covered: 15, total: 20 });
  });

  it('uses the only data row when the table covers a single file', () => {
    const table = ['Name        Stmts   Miss  Cover', '-------------------------------', 'app/one.py     12      3    75%', ''].join('\n');
    expect(parseCoverageReport('tabular', table)).toEqual({ covered: 9, total: 12 });
  });

  it('returns null when there is nothing to read', () => {
    expect(parseCoverageReport('tabular', 'No data to report.\n')).toBeNull();
  });
});

describe('json-summary parser', () => {
  it('reads total line counts', () => {
    const doc = JSON.stringify({
      total: {
        lines: { total: 200, covered: 150, skipped: 0, pct: 75 },
        statements: { total: 210, covered: 151, skipped: 0, pct: 71.9 }
      }
    });
    expect(parseCoverageReport('json-summary', doc)).toEqual({ covered: 150, total: 200 });
  });

  it('rejects malformed documents', () => {
    expect(parseCoverageReport('json-summary', '{ not json')).toBeNull();
    expect(parseCoverageReport('json-summary', JSON.stringify({ total: {} }))).toBeNull();
  });
});

describe('cobertura parser', () => {
  it('reads root line counters', () => {
    const xml = [
      '<?xml version="1.0" ?>',
      '<coverage line-rate="0.8" lines-covered="80" lines-valid="100" branch-rate="0" version="1.9">',
      '  <packages><package name="Shop" line-rate="0.8"/></packages>',
      '</coverage>'
    ].join('\n');
    expect(parseCoverageReport('cobertura', xml)).toEqual({ covered: 80, total: 100 });
  });

  it('returns null without the counters', () => {
    expect(parseCoverageReport('cobertura', '<coverage line-rate="0.5"></coverage>')).toBeNull();
  });
});

describe('jacoco parser', () => {
  it('uses the report-level LINE counter after the last package', () => {
    const xml = [
      '<report name="shop">',
      '  <package name="shop">',
      '    <class name="shop/Cart"><counter type="LINE" missed="1" covered="9"/></class>',
      '    <counter type="LINE" missed="1" covered="9"/>',
      '  </package>',
      '  <counter type="INSTRUCTION" missed="10" covered="90"/>',
      '  <counter type="LINE" missed="4" covered="36"/>',
      '</report>'
    ].join('\n');
    expect(parseCoverageReport('jacoco', xml)).toEqual({ covered: 36, total: 40 });
  });

  it('returns null for documents that are not JaCoCo reports', () => {
    expect(parseCoverageReport('jacoco', '<coverage lines-valid="1" lines-covered="1"/>')).toBeNull();
  });
});

describe('go profile parser', () => {
  it('sums statements and counts a repeated block once', () => {
    const profile = [
      'mode: set',
      'example.com/shop/cart.go:5.30,7.2 2 1',
      'example.com/shop/cart.go:9.30,11.2 3 0',
      'example.com/shop/cart.go:9.30,11.2 3 1',
      'example.com/shop/tax.go:3.20,4.2 1 0',
      ''
    ].join('\n');
    expect(parseCoverageReport('go-profile', profile)).toEqual({ covered: 5, total: 6 });
  });

  it('reads an empty profile as zero', () => {
    expect(parseCoverageReport('go-profile', 'mode: atomic\n')).toEqual({ covered: 0, total: 0 });
    expect(parseCoverageReport('go-profile', '')).toBeNull();
  });
});

describe('lcov parser', () => {
  it('prefers LF/LH and falls back to DA lines per record', () => {
    const info = [
      'SF:src/a.js',
      'DA:1,1',
      'LF:10',
      'LH:7',
      'end_of_record',
      'SF:src/b.js',
      'DA:1,3',
      'DA:2,0',
      'DA:3,1',
      'end_of_record',
      ''
    ].join('\n');
    expect(parseCoverageReport('lcov', info)).toEqual({ covered: 9, total: 13 });
  });

  it('returns null without records', () => {
    expect(parseCoverageReport('lcov', 'TN:\n')).toBeNull();
  });
});

describe('parser registry', () => {
  it('registers one parser per format under its own key', () => {
    for (const [format, parser] of Object.entries(PARSERS)) expect(parser.format).toBe(format);
  });
});
