import { withTempDir } from '../../utils/fs.js';
import { runStep } from '../steps.js';
import type { PerProjectToolchain } from '../types.js';
import { manifestDirs, sumReports, topmostDirs } from './projects.js';

/**
 * A solution directory covers its projects; loose `.csproj` directories outside
 * any solution are measured on their own.
 */
export const dotnetToolchain: PerProjectToolchain = {
  id: 'dotnet',
  strategy: 'per-project',
  ecosystems: ['csharp'],
  extensions: ['.cs'],

  async findProjects(_root, files) {
    const solutions = manifestDirs(files, (name) => name.endsWith('.sln'));
    const projects = manifestDirs(files, (name) => name.endsWith('.csproj'));
    return topmostDirs([...solutions, ...projects]);
  },

  async runProject(ctx, dir) {
    return await ctx.lock.run(dir, () =>
      withTempDir('testlayers-dotnet-', async (tmp) => {
        const run = await runStep(ctx, {
          command: 'dotnet',
          args: [
            'test',
            '--nologo',
            '--collect:XPlat Code Coverage',
            '--results-directory',
            tmp,
            '--',
            'DataCollectionRunSettings.DataCollectors.DataCollector.Configuration.Format=cobertura'
          ],
          cwd: dir,
          timeoutMs: ctx.settings.testTimeoutMs
        });
        if (run.status !== 'ok') return run;

        // coverlet writes <results>/<guid>/coverage.cobertura.xml, one per test project.
        const totals = await sumReports(tmp, 'coverage.cobertura.xml', 'cobertura');
        return totals ? { status: 'ok', totals } : { status: 'failed', reason: 'dotnet test wrote no Cobertura report' };
      })
    );
  }
};
