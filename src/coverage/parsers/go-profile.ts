import type { CoverageReportParser } from './types.js';

/**
 * `go test -coverprofile` output:
 *
 *   mode: set
 *   example.com/pkg/file.go:3.23,5.2 1 1
 *
 * Each block contributes its statement count to the total, and to the covered
 * count when its hit count is positive. A block listed twice (several packages
 * under `./...`) counts once, covered if any listing hit it.
 */
export const goProfileParser: CoverageReportParser = {
  format: 'go-profile',
  parse(content) {
    const blocks = new Map<string, { statements: number; hit: boolean }>();
    let sawMode = false;

    for (const raw of content.split('\n')) {
      const line = raw.trim();
      if (!line) continue;
      if (line.startsWith('mode:')) {
        sawMode = true;
        continue;
      }

      const countIdx = line.lastIndexOf(' ');
      if (countIdx === -1) continue;
      const rest = line.slice(0, countIdx);
      const stmtIdx = rest.lastIndexOf(' ');
      if (stmtIdx === -1) continue;

      const block = rest.slice(0, stmtIdx);
      const statements = Number.parseInt(rest.slice(stmtIdx + 1), 10);
      const count = Number.parseInt(line.slice(countIdx + 1), 10);
      if (Number.isNaN(statements) || Number.isNaN(count)) continue;

      const prev = blocks.get(block);
      blocks.set(block, { statements, hit: (prev?.hit ?? false) || count > 0 });
    }

    if (!sawMode && blocks.size === 0) return null;

    let total = 0;
    let covered = 0;
    for (const b of blocks.values()) {
      total += b.statements;
      if (b.hit) covered += b.statements;
    }
    return { covered, total };
  }
};
