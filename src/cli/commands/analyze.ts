import { resolve } from 'node:path';

import { analyzeRepository, type AnalysisPhase } from '../../analysis/analyzer.js';
import type { AnalysisSettings } from '../../config/settings.js';
import type { ToolRunner } from '../../coverage/process.js';
import type { Report } from '../../report/types.js';
import type { Logger } from '../../utils/logger.js';
import { getRenderer } from '../ui/renderer.js';
import type { SpinnerHandle } from '../ui/spinner.js';
import { cliLogger } from './logger.js';

export interface AnalyzeCommandOptions {
  path?: string;
  json?: boolean;
  coverage?: boolean;
  install?: boolean;
  rulesPath?: string;
  concurrency?: number;
  timeoutMs?: number;
  runner?: ToolRunner;
  logger?: Logger;
}

const PHASE_TEXT: Record<AnalysisPhase, string> = {
  discover: 'Scanning repository',
  classify: 'Classifying test files',
  stack: 'Detecting stack',
  coverage: 'Measuring coverage',
  aggregate: 'Building report'
};

/**
 * `testlayers analyze [path]`: classifies the repository's tests and prints the report.
 */
export async function runAnalyzeCommand(
  opts: AnalyzeCommandOptions
): Promise<{ ok: boolean; details?: unknown; report?: Report }> {
  const r = getRenderer();
  const root = resolve(opts.path ?? process.cwd());

  const settings: Partial<AnalysisSettings> = {};
  if (opts.concurrency !== undefined) settings.concurrency = opts.concurrency;
  if (opts.timeoutMs !== undefined) settings.testTimeoutMs = opts.timeoutMs;

  const started = Date.now();
  const progress: { spinner: SpinnerHandle | null } = { spinner: null };

  let report: Report;
  try {
    report = await analyzeRepository(root, {
      rulesPath: opts.rulesPath,
      coverage: opts.coverage !== false,
      install: opts.install !== false,
      settings,
      runner: opts.runner,
      logger: opts.logger ?? cliLogger(),
      onPhase: (phase) => {
        if (opts.json) return;
        if (progress.spinner) progress.spinner.update(PHASE_TEXT[phase]);
        else progress.spinner = r.spinner(PHASE_TEXT[phase]);
      }
    });
  } catch (err) {
    progress.spinner?.fail('Analysis failed');
    return { ok: false, details: err instanceof Error ? err.message : String(err) };
  }
  progress.spinner?.succeed('Analysis complete');

  if (opts.json) r.json(report);
  else r.report(report, { durationMs: Date.now() - started });

  return { ok: true, report };
}
