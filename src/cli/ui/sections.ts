import type { DuplicateEntry } from '../../analysis/duplicates.js';
import type { CompiledRuleSet } from '../../classification/rules.js';
import { LAYERS, type ClassifiedFile, type Layer } from '../../classification/types.js';
import type { CoverageRecord } from '../../coverage/record.js';
import type { CoverageRunOutcome } from '../../coverage/types.js';
import type { TechStack } from '../../stack/types.js';
import { formatPercent, padLeft, padRight } from './format.js';
import { theme, INDENT, LAYER_LABEL_WIDTH } from './theme.js';

export function stackSummary(stacks: readonly TechStack[]): string {
  if (stacks.length === 0) return `${INDENT}${theme.dim('No stack detected')}`;
  return stacks.map((s) => `${INDENT}${theme.bullet} ${s.framework ? theme.bold(s.label) : s.label}`).join('\n');
}

/**
 * Files per layer with their test functions:
 *
 *   unit  (3 tests, 1 file)
 *     tests/test_math.py
 *       test_add:3  test_sub:6  test_mul:9
 */
export function layerFilesSummary(files: Readonly<Record<Layer, readonly ClassifiedFile[]>>, testCounts: Readonly<Record<Layer, number>>): string {
  const lines: string[] = [];
  for (const layer of LAYERS) {
    const list = files[layer];
    const header = `${theme.layer(layer)(theme.bold(layer))}  ${theme.dim(`(${plural(testCounts[layer], 'test')}, ${plural(list.length, 'file')})`)}`;
    lines.push(`${INDENT}${header}`);
    for (const f of list) {
      const mixed = f.layers.length > 1 ? theme.dim(`  [matched: ${f.layers.join(', ')}]`) : '';
      lines.push(`${INDENT}${INDENT}${f.file.relativePath}${mixed}`);
      if (f.functions.length > 0) {
        lines.push(`${INDENT}${INDENT}${INDENT}${theme.dim(f.functions.map((fn) => `${fn.name}:${fn.line}`).join('  '))}`);
      }
    }
  }
  return lines.join('\n');
}

export function duplicatesSummary(entries: readonly DuplicateEntry[]): string {
  if (entries.length === 0) return `${INDENT}${theme.dim('No test names shared across layers')}`;
  return entries
    .map((d) => `${INDENT}${theme.warning(d.name)} ${theme.dim(`${d.layer} ${theme.arrow} also in ${d.otherLayers.join(', ')}`)}  ${d.file}:${d.line}`)
    .join('\n');
}

/**
 *   Layer          Tests   Covered/Total       %
 *   unit               3           8/10    80.0%
 */
export function coverageTable(coverage: Readonly<Record<Layer, CoverageRecord>>, testCounts: Readonly<Record<Layer, number>>): string {
  const header = `${INDENT}${padRight('Layer', LAYER_LABEL_WIDTH)}${padLeft('Tests', 6)}${padLeft('Covered/Total', 16)}${padLeft('%', 9)}`;
  const rows = LAYERS.map((layer) => {
    const rec = coverage[layer];
    const name = theme.layer(layer)(padRight(layer, LAYER_LABEL_WIDTH));
    return `${INDENT}${name}${padLeft(String(testCounts[layer]), 6)}${padLeft(`${rec.covered}/${rec.total}`, 16)}${padLeft(formatPercent(rec.percentage), 9)}`;
  });
  return [theme.dim(header), ...rows].join('\n');
}

/** Coverage units that did not produce numbers; empty string when all did. */
export function unmeasuredSummary(runs: readonly CoverageRunOutcome[]): string {
  return runs
    .filter((r) => r.status !== 'ok')
    .map((r) => {
      const icon = r.status === 'skipped' ? theme.dim('-') : theme.cross;
      const where = r.layer ? `${r.directory} (${r.layer})` : r.directory;
      return `${INDENT}${icon} ${theme.bold(r.toolchain)} ${where}  ${theme.dim(`${r.status}: ${r.reason ?? ''}`)}`;
    })
    .join('\n');
}

export function ruleSetSummary(rules: CompiledRuleSet, source: string): string[] {
  const lines = [`${theme.dim('Source')}      ${source}`, `${theme.dim('Version')}     ${rules.version}`, `${theme.dim('Extensions')}  ${[...rules.extensions].join(' ')}`, ''];
  for (const layer of LAYERS) {
    const ids = rules.identity[layer].map((r) => r.id);
    lines.push(`${theme.layer(layer)(padRight(layer, LAYER_LABEL_WIDTH))}${plural(ids.length, 'rule')}`);
  }
  lines.push('', `${padRight('declarations', LAYER_LABEL_WIDTH)}${plural(rules.declarations.length, 'rule')}`);
  return lines;
}

function plural(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? '' : 's'}`;
}
