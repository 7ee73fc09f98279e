import type { DuplicateEntry } from '../analysis/duplicates.js';
import { emptyByLayer, LAYERS, type ClassifiedFile, type Layer } from '../classification/types.js';
import { coverageRecord, type CoverageRecord } from '../coverage/record.js';
import type { CoverageResult } from '../coverage/types.js';
import type { TechStack } from '../stack/types.js';
import { deepFreeze } from '../utils/freeze.js';
import type { Report } from './types.js';

export interface AggregateExtras {
  repositoryRoot: string;
  stacks?: readonly TechStack[];
}

/**
 * Merge the pieces of an analysis into a frozen Report. Inputs are copied, so
 * the caller's arrays stay mutable.
 *
 * Throws on inconsistent input (a file listed twice, a function owned by a
 * different file); those are bugs upstream, not repository conditions.
 */
export function aggregate(
  classified: readonly ClassifiedFile[],
  duplicates: readonly DuplicateEntry[],
  coverage: CoverageResult | null,
  extras: AggregateExtras
): Report {
  const files = emptyByLayer<ClassifiedFile[]>(() => []);
  const testCounts = emptyByLayer(() => 0);
  const seen = new Set<string>();

  for (const f of classified) {
    if (seen.has(f.file.relativePath)) throw new Error(`File classified twice: ${f.file.relativePath}`);
    seen.add(f.file.relativePath);
    if (!LAYERS.includes(f.primaryLayer)) throw new Error(`Unknown layer for ${f.file.relativePath}: ${String(f.primaryLayer)}`);

    for (const fn of f.functions) {
      if (fn.file !== f.file.relativePath) {
        throw new Error(`Test function ${fn.name} belongs to ${fn.file}, listed under ${f.file.relativePath}`);
      }
    }

    files[f.primaryLayer].push(copyFile(f));
    testCounts[f.primaryLayer] += f.functions.length;
  }

  for (const layer of LAYERS) {
    files[layer].sort((a, b) => (a.file.relativePath < b.file.relativePath ? -1 : a.file.relativePath > b.file.relativePath ? 1 : 0));
  }

  const byLayer: Record<Layer, CoverageRecord> = emptyByLayer(() => coverageRecord(0, 0));
  if (coverage) {
    // Rebuilt so each percentage is derived from the counts it is stored with.
    for (const layer of LAYERS) byLayer[layer] = coverageRecord(coverage.byLayer[layer].covered, coverage.byLayer[layer].total);
  }

  return deepFreeze({
    repositoryRoot: extras.repositoryRoot,
    files,
    testCounts,
    duplicates: duplicates.map((d) => ({ ...d, otherLayers: [...d.otherLayers] })),
    coverage: byLayer,
    stacks: (extras.stacks ?? []).map((s) => ({ ...s })),
    coverageRuns: (coverage?.runs ?? []).map((r) => ({ ...r, ...(r.measured ? { measured: { ...r.measured } } : {}) }))
  });
}

function copyFile(f: ClassifiedFile): ClassifiedFile {
  return {
    file: { path: f.file.path, relativePath: f.file.relativePath, extension: f.file.extension },
    layers: [...f.layers],
    primaryLayer: f.primaryLayer,
    functions: f.functions.map((fn) => ({ ...fn }))
  };
}
