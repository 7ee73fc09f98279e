import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join, relative } from 'node:path';
import picomatch from 'picomatch';

import { toPosix } from '../utils/fs.js';
import { defaultLogger, type Logger } from '../utils/logger.js';

export interface WalkOptions {
  /** picomatch globs over repository-relative POSIX paths. */
  exclude?: readonly string[];
  logger?: Logger;
}

export interface WalkedFile {
  path: string;
  relativePath: string;
  name: string;
}

/**
 * Recursively list regular files under `root`, skipping hidden entries and
 * anything matched by `exclude`. Results are sorted by relative path so a given
 * tree always yields the same order.
 */
export async function walkRepository(root: string, opts: WalkOptions = {}): Promise<WalkedFile[]> {
  const log = opts.logger ?? defaultLogger();
  const isExcluded = opts.exclude && opts.exclude.length > 0 ? picomatch([...opts.exclude], { dot: true }) : () => false;
  const out: WalkedFile[] = [];

  async function visit(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      log.warn(`Skipping unreadable directory ${dir}`, { error: err instanceof Error ? err.message : String(err) });
      return;
    }

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const abs = join(dir, entry.name);
      const rel = toPosix(relative(root, abs));
      if (entry.isDirectory()) {
        // `dir/**` globs match the directory's children; probe with a child path to prune early.
        if (isExcluded(`${rel}/_`)) continue;
        await visit(abs);
      } else if (entry.isFile()) {
        if (isExcluded(rel)) continue;
        out.push({ path: abs, relativePath: rel, name: entry.name });
      }
    }
  }

  await visit(root);
  return out.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}
