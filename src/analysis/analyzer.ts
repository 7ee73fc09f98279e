import { resolve } from 'node:path';

import { ClassificationEngine } from '../classification/engine.js';
import { loadRuleSet, type CompiledRuleSet } from '../classification/rules.js';
import type { ClassifiedFile } from '../classification/types.js';
import { resolveSettings, type AnalysisSettings } from '../config/settings.js';
import { runCoverage } from '../coverage/orchestrator.js';
import type { ToolRunner } from '../coverage/process.js';
import type { CoverageResult, Toolchain } from '../coverage/types.js';
import { discoverCandidates, loadSourceFile } from '../discovery/discover.js';
import { walkRepository } from '../discovery/walker.js';
import { aggregate } from '../report/aggregate.js';
import type { Report } from '../report/types.js';
import { detectStack, STACK_SCAN_EXCLUDE } from '../stack/detector.js';
import { isDirectory } from '../utils/fs.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import { runPool } from '../utils/worker-pool.js';
import { findDuplicates } from './duplicates.js';

export type AnalysisPhase = 'discover' | 'classify' | 'stack' | 'coverage' | 'aggregate';

export interface AnalyzeOptions {
  /** Compiled rule set; loaded from `rulesPath` (or the bundled defaults) when omitted. */
  rules?: CompiledRuleSet;
  rulesPath?: string;
  /** Run external coverage tools. Defaults to true. */
  coverage?: boolean;
  /** Install JS dependencies before measuring. Defaults to true. */
  install?: boolean;
  /** Overrides on top of the environment-derived settings. */
  settings?: Partial<AnalysisSettings>;
  runner?: ToolRunner;
  toolchains?: readonly Toolchain[];
  logger?: Logger;
  onPhase?: (phase: AnalysisPhase) => void;
}

/**
 * Classify a repository's tests by layer and measure coverage per layer.
 *
 * Throws only when `root` is not a directory or the rule set is invalid. Every
 * other failure (an unreadable file, a failing coverage tool) is absorbed and
 * shows up as missing data plus a log line.
 */
export async function analyzeRepository(root: string, opts: AnalyzeOptions = {}): Promise<Report> {
  const repositoryRoot = resolve(root);
  if (!(await isDirectory(repositoryRoot))) {
    throw new Error(`Repository path does not exist or is not a directory: ${repositoryRoot}`);
  }

  const log = opts.logger ?? defaultLogger();
  const settings = { ...resolveSettings(), ...opts.settings };
  const rules = opts.rules ?? (await loadRuleSet(opts.rulesPath));
  const engine = new ClassificationEngine(rules, { logger: log });

  opts.onPhase?.('discover');
  const candidates = await discoverCandidates(repositoryRoot, rules, { logger: log });
  log.debug(`Found ${candidates.length} candidate files`);

  opts.onPhase?.('classify');
  const results = await runPool(candidates, settings.concurrency, async (candidate): Promise<ClassifiedFile | null> => {
    const file = await loadSourceFile(candidate, log);
    if (!file) return null;
    const c = engine.classify(file);
    if (!c.primaryLayer) return null;
    return {
      file: { path: file.path, relativePath: file.relativePath, extension: file.extension },
      layers: c.layers,
      primaryLayer: c.primaryLayer,
      functions: c.functions
    };
  });
  const classified = results.filter((r): r is ClassifiedFile => r !== null);
  log.info(`Classified ${classified.length} test files`);

  opts.onPhase?.('stack');
  const listing = await walkRepository(repositoryRoot, { exclude: STACK_SCAN_EXCLUDE, logger: log });
  const stacks = await detectStack(repositoryRoot, { logger: log, files: listing });
  const duplicates = findDuplicates(classified);
  log.debug(`Detected stacks: ${stacks.map((s) => s.label).join(', ') || 'none'}`);

  let coverage: CoverageResult | null = null;
  if (opts.coverage !== false) {
    opts.onPhase?.('coverage');
    coverage = await runCoverage(repositoryRoot, classified, stacks, {
      settings: {
        testTimeoutMs: settings.testTimeoutMs,
        reportTimeoutMs: settings.reportTimeoutMs,
        pythonCommand: settings.pythonCommand,
        install: opts.install !== false
      },
      runner: opts.runner,
      toolchains: opts.toolchains,
      logger: log,
      files: listing
    });
  }

  opts.onPhase?.('aggregate');
  return aggregate(classified, duplicates, coverage, { repositoryRoot, stacks });
}
