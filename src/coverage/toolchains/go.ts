import { join } from 'node:path';

import { tryReadText, withTempDir } from '../../utils/fs.js';
import { parseCoverageReport } from '../parsers/index.js';
import { runStep } from '../steps.js';
import type { PerProjectToolchain } from '../types.js';
import { manifestDirs } from './projects.js';

export const goToolchain: PerProjectToolchain = {
  id: 'go',
  strategy: 'per-project',
  ecosystems: ['go'],
  extensions: ['.go'],

  async findProjects(_root, files) {
    return manifestDirs(files, (name) => name === 'go.mod');
  },

  async runProject(ctx, dir) {
    return await ctx.lock.run(dir, () =>
      withTempDir('testlayers-go-', async (tmp) => {
        const profile = join(tmp, 'cover.out');
        const run = await runStep(ctx, {
          command: 'go',
          args: ['test', `-coverprofile=${profile}`, './...'],
          cwd: dir,
          timeoutMs: ctx.settings.testTimeoutMs
        });
        if (run.status !== 'ok') return run;

        const content = await tryReadText(profile);
        const totals = content === null ? null : parseCoverageReport('go-profile', content);
        return totals ? { status: 'ok', totals } : { status: 'failed', reason: 'go test wrote no cover profile' };
      })
    );
  }
};
