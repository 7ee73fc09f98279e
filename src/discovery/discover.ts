import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import type { ClassificationEngine } from '../classification/engine.js';
import type { CompiledRuleSet } from '../classification/rules.js';
import type { SourceFile } from '../classification/types.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import { runPool } from '../utils/worker-pool.js';
import { walkRepository, type WalkedFile } from './walker.js';

export interface DiscoverOptions {
  logger?: Logger;
  concurrency?: number;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Candidate files: everything under `root` that survives the deny-list and the
 * hidden-file rule and carries an allow-listed extension.
 */
export async function discoverCandidates(
  root: string,
  rules: Pick<CompiledRuleSet, 'extensions' | 'exclude'>,
  opts: Pick<DiscoverOptions, 'logger'> = {}
): Promise<WalkedFile[]> {
  const files = await walkRepository(root, { exclude: rules.exclude, logger: opts.logger });
  return files.filter((f) => rules.extensions.has(extname(f.name).toLowerCase()));
}

/**
 * Read a candidate once. Returns null (and logs) when the file cannot be read or
 * is not valid UTF-8.
 */
export async function loadSourceFile(candidate: WalkedFile, logger: Logger = defaultLogger()): Promise<SourceFile | null> {
  try {
    const bytes = await readFile(candidate.path);
    const content = utf8.decode(bytes);
    return {
      path: candidate.path,
      relativePath: candidate.relativePath,
      extension: extname(candidate.name).toLowerCase(),
      content
    };
  } catch (err) {
    logger.warn(`Skipping unreadable file ${candidate.relativePath}`, { error: err instanceof Error ? err.message : String(err) });
    return null;
  }
}

/**
 * Candidates whose content or path matches any layer rule or declaration.
 */
export async function discoverTestFiles(root: string, engine: ClassificationEngine, opts: DiscoverOptions = {}): Promise<SourceFile[]> {
  const log = opts.logger ?? defaultLogger();
  const candidates = await discoverCandidates(root, engine.rules, { logger: log });
  const loaded = await runPool(candidates, opts.concurrency ?? 4, async (c) => {
    const file = await loadSourceFile(c, log);
    return file && engine.isTestFile(file) ? file : null;
  });
  return loaded.filter((f): f is SourceFile => f !== null);
}
