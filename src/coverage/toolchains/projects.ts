import { dirname, isAbsolute, join, relative } from 'node:path';

import type { WalkedFile } from '../../discovery/walker.js';
import { walkRepository } from '../../discovery/walker.js';
import { fileExists, tryReadText } from '../../utils/fs.js';
import { parseCoverageReport, type ReportFormat } from '../parsers/index.js';
import { addTotals, zeroTotals, type CoverageTotals } from '../record.js';

/** Directories holding a file accepted by `match`, deduplicated and sorted. */
export function manifestDirs(files: readonly WalkedFile[], match: (name: string) => boolean): string[] {
  return [...new Set(files.filter((f) => match(f.name)).map((f) => dirname(f.path)))].sort();
}

/** Drop directories nested inside another directory of the list. */
export function topmostDirs(dirs: readonly string[]): string[] {
  const sorted = [...dirs].sort((a, b) => a.length - b.length);
  const kept: string[] = [];
  for (const d of sorted) {
    if (!kept.some((k) => isWithin(k, d))) kept.push(d);
  }
  return kept.sort();
}

export function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/** Prefer a checked-in wrapper script (`./mvnw`, `./gradlew`) over a global tool. */
export async function wrapperOr(dir: string, wrapper: string, fallback: string): Promise<string> {
  return (await fileExists(join(dir, wrapper))) ? join(dir, wrapper) : fallback;
}

/**
 * Sum every report under `dir` whose relative path ends with `suffix`, e.g. one
 * JaCoCo XML per module of a multi-module build. Null when none parse.
 */
export async function sumReports(dir: string, suffix: string, format: ReportFormat): Promise<CoverageTotals | null> {
  const files = await walkRepository(dir, { exclude: ['**/node_modules/**', '**/src/**'] });
  let sum: CoverageTotals | null = null;
  for (const f of files.filter((w) => w.relativePath === suffix || w.relativePath.endsWith(`/${suffix}`))) {
    const content = await tryReadText(f.path);
    const totals = content === null ? null : parseCoverageReport(format, content);
    if (totals) sum = addTotals(sum ?? zeroTotals(), totals);
  }
  return sum;
}
