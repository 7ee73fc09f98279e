import { LAYERS, type ClassifiedFile, type Layer } from '../classification/types.js';

export interface DuplicateEntry {
  name: string;
  layer: Layer;
  file: string;
  line: number;
  /** Layers other than `layer` under which the same name occurs. */
  otherLayers: Layer[];
}

interface Occurrence {
  layer: Layer;
  file: string;
  line: number;
}

/**
 * Report test names that occur under more than one layer, one entry per
 * occurrence. Reuse of a name within a single layer is not a duplicate.
 */
export function findDuplicates(files: readonly ClassifiedFile[]): DuplicateEntry[] {
  const byName = new Map<string, Occurrence[]>();
  for (const f of files) {
    for (const fn of f.functions) {
      const list = byName.get(fn.name) ?? [];
      list.push({ layer: f.primaryLayer, file: fn.file, line: fn.line });
      byName.set(fn.name, list);
    }
  }

  const out: DuplicateEntry[] = [];
  for (const [name, occurrences] of byName) {
    const layersPresent = new Set(occurrences.map((o) => o.layer));
    if (layersPresent.size < 2) continue;
    for (const o of occurrences) {
      const otherLayers = LAYERS.filter((l) => l !== o.layer && layersPresent.has(l));
      out.push({ name, layer: o.layer, file: o.file, line: o.line, otherLayers });
    }
  }

  return out.sort(
    (a, b) => compare(a.name, b.name) || LAYERS.indexOf(a.layer) - LAYERS.indexOf(b.layer) || compare(a.file, b.file) || a.line - b.line
  );
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
