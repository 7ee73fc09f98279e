import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ClassifiedFile, Layer } from '../../classification/types.js';
import { toPosix, withTempDir } from '../../utils/fs.js';
import { parseCoverageReport } from '../parsers/index.js';
import { runStep } from '../steps.js';
import type { PerLayerToolchain, ToolchainContext, UnitResult } from '../types.js';

/**
 * coverage.py configuration for one layer run: measure the repository, keep the
 * data file in the run's temp directory, and omit the other layers' test files.
 */
export function buildRcfile(opts: { root: string; dataFile: string; omit: readonly string[] }): string {
  const omit = [...opts.omit.map(toPosix), '*/site-packages/*'];
  return ['[run]', `source = ${toPosix(opts.root)}`, `data_file = ${toPosix(opts.dataFile)}`, 'omit =', ...omit.map((o) => `    ${o}`), ''].join('\n');
}

export const pythonToolchain: PerLayerToolchain = {
  id: 'python',
  strategy: 'per-layer',
  ecosystems: ['python'],
  extensions: ['.py'],

  async runLayer(ctx: ToolchainContext, layer: Layer, layerFiles: readonly ClassifiedFile[], otherFiles: readonly ClassifiedFile[]): Promise<UnitResult> {
    const py = ctx.settings.pythonCommand;

    return await ctx.lock.run(ctx.root, () =>
      withTempDir(`testlayers-py-${layer}-`, async (tmp) => {
        const rcfile = join(tmp, 'coveragerc');
        await writeFile(
          rcfile,
          buildRcfile({ root: ctx.root, dataFile: join(tmp, '.coverage'), omit: otherFiles.map((f) => f.file.path) }),
          'utf8'
        );

        const run = await runStep(ctx, {
          command: py,
          args: ['-m', 'coverage', 'run', `--rcfile=${rcfile}`, '-m', 'pytest', '-q', ...layerFiles.map((f) => f.file.relativePath)],
          cwd: ctx.root,
          timeoutMs: ctx.settings.testTimeoutMs
        });
        if (run.status !== 'ok') return run;

        const report = await runStep(ctx, {
          command: py,
          args: ['-m', 'coverage', 'report', `--rcfile=${rcfile}`],
          cwd: ctx.root,
          timeoutMs: ctx.settings.reportTimeoutMs
        });
        if (report.status !== 'ok') return report;

        const totals = parseCoverageReport('tabular', report.stdout);
        return totals ? { status: 'ok', totals } : { status: 'failed', reason: 'coverage report printed no totals' };
      })
    );
  }
};
