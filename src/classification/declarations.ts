import type { CompiledDeclarationRule } from './rules.js';
import type { SourceFile, TestFunction } from './types.js';

/**
 * Extract test declarations from a file. Entries are ordered by line; a
 * declaration seen by two rules at the same line is kept once.
 */
export function extractTestFunctions(file: SourceFile, rules: readonly CompiledDeclarationRule[]): TestFunction[] {
  const applicable = rules.filter((r) => r.extensions.has(file.extension));
  if (applicable.length === 0) return [];

  const lineStarts = indexLineStarts(file.content);
  const seen = new Set<string>();
  const out: TestFunction[] = [];

  for (const rule of applicable) {
    for (const m of file.content.matchAll(rule.regex)) {
      const name = m.groups?.name?.trim();
      if (!name) continue;
      const offset = m.indices?.groups?.name?.[0] ?? m.index ?? 0;
      const line = lineAt(lineStarts, offset);
      const key = `${line}\u0000${name}`;
      if (seen.has(key)) continue;
      seen.add(key);
      out.push({ name, file: file.relativePath, line, rule: rule.id });
    }
  }

  return out.sort((a, b) => a.line - b.line || a.name.localeCompare(b.name));
}

function indexLineStarts(content: string): number[] {
  const starts = [0];
  for (let i = 0; i < content.length; i++) {
    if (content.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

/** 1-based line containing `offset`. */
function lineAt(lineStarts: number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}
