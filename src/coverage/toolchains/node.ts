import { join } from 'node:path';

import { fileExists, isRecord, modifiedAt, readJson, tryReadText, withTempDir } from '../../utils/fs.js';
import { parseCoverageReport } from '../parsers/index.js';
import type { CoverageTotals } from '../record.js';
import { runStep } from '../steps.js';
import type { PerProjectToolchain, ToolchainContext, UnitResult } from '../types.js';
import { manifestDirs } from './projects.js';

const NPM_PLACEHOLDER_TEST = /no test specified/i;

export type NodeTestRunner = 'vitest' | 'jest' | 'npm';

export interface NodeManifest {
  testScript: string | null;
  dependencies: Set<string>;
}

export async function readManifest(dir: string): Promise<NodeManifest | null> {
  let doc: unknown;
  try {
    doc = await readJson(join(dir, 'package.json'));
  } catch {
    return null;
  }
  if (!isRecord(doc)) return null;

  const scripts = isRecord(doc.scripts) ? doc.scripts : {};
  const test = typeof scripts.test === 'string' ? scripts.test : null;
  const dependencies = new Set<string>();
  for (const key of ['dependencies', 'devDependencies', 'peerDependencies']) {
    const block = doc[key];
    if (isRecord(block)) for (const name of Object.keys(block)) dependencies.add(name);
  }
  return { testScript: test, dependencies };
}

/** A test script that actually runs something, not npm's init placeholder. */
export function hasRealTestScript(m: NodeManifest): boolean {
  return !!m.testScript && m.testScript.trim() !== '' && !NPM_PLACEHOLDER_TEST.test(m.testScript);
}

export function detectTestRunner(m: NodeManifest): NodeTestRunner {
  const script = m.testScript ?? '';
  if (m.dependencies.has('vitest') || /\bvitest\b/.test(script)) return 'vitest';
  if (m.dependencies.has('jest') || /\bjest\b/.test(script)) return 'jest';
  return 'npm';
}

/** Command line producing a json-summary report in `reportDir`. */
export function coverageCommand(runner: NodeTestRunner, reportDir: string): { command: string; args: string[] } {
  switch (runner) {
    case 'vitest':
      return {
        command: 'npx',
        args: [
          '--no-install',
          'vitest',
          'run',
          '--coverage.enabled=true',
          '--coverage.reporter=json-summary',
          '--coverage.reporter=lcov',
          `--coverage.reportsDirectory=${reportDir}`
        ]
      };
    case 'jest':
      return {
        command: 'npx',
        args: [
          '--no-install',
          'jest',
          '--coverage',
          '--coverageReporters=json-summary',
          '--coverageReporters=lcov',
          `--coverageDirectory=${reportDir}`
        ]
      };
    case 'npm':
      return { command: 'npm', args: ['test', '--', '--coverage'] };
  }
}

export const nodeToolchain: PerProjectToolchain = {
  id: 'node',
  strategy: 'per-project',
  ecosystems: ['javascript', 'typescript'],
  extensions: ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx'],

  async findProjects(_root, files) {
    const out: string[] = [];
    for (const dir of manifestDirs(files, (name) => name === 'package.json')) {
      const manifest = await readManifest(dir);
      if (manifest && hasRealTestScript(manifest)) out.push(dir);
    }
    return out;
  },

  async runProject(ctx: ToolchainContext, dir: string): Promise<UnitResult> {
    const manifest = await readManifest(dir);
    if (!manifest || !hasRealTestScript(manifest)) {
      return { status: 'skipped', reason: 'package.json has no test script' };
    }

    return await ctx.lock.run(dir, async () => {
      if (!(await fileExists(join(dir, 'node_modules')))) {
        if (!ctx.settings.install) return { status: 'skipped', reason: 'node_modules missing and installs are disabled' };
        const useCi = await fileExists(join(dir, 'package-lock.json'));
        const install = await runStep(ctx, {
          command: 'npm',
          args: [useCi ? 'ci' : 'install', '--no-audit', '--no-fund'],
          cwd: dir,
          timeoutMs: ctx.settings.testTimeoutMs
        });
        if (install.status !== 'ok') return install;
      }

      return await withTempDir('testlayers-node-', async (tmp) => {
        const runner = detectTestRunner(manifest);
        const { command, args } = coverageCommand(runner, tmp);
        ctx.logger.debug(`Using ${runner} for ${dir}`);
        const startedAt = Date.now();
        const run = await runStep(ctx, { command, args, cwd: dir, timeoutMs: ctx.settings.testTimeoutMs });
        if (run.status !== 'ok') return run;

        // vitest and jest were told where to write; `npm test` may write to ./coverage, or ignore
        // --coverage entirely and leave an older report there.
        const totals =
          runner === 'npm' ? await readNodeArtifacts([join(dir, 'coverage')], startedAt) : await readNodeArtifacts([tmp]);
        return totals ? { status: 'ok', totals } : { status: 'failed', reason: 'no coverage summary was written' };
      });
    });
  }
};

/** Tolerance for filesystems that store mtimes in whole seconds. */
const MTIME_SLACK_MS = 1_000;

/**
 * First json-summary found across `dirs`, else the first LCOV file. With
 * `writtenSince`, files last modified before that moment are ignored.
 */
export async function readNodeArtifacts(dirs: readonly string[], writtenSince?: number): Promise<CoverageTotals | null> {
  for (const [file, format] of [
    ['coverage-summary.json', 'json-summary'],
    ['lcov.info', 'lcov']
  ] as const) {
    for (const dir of dirs) {
      const path = join(dir, file);
      if (writtenSince !== undefined) {
        const mtime = await modifiedAt(path);
        if (mtime === null || mtime < writtenSince - MTIME_SLACK_MS) continue;
      }
      const content = await tryReadText(path);
      const totals = content === null ? null : parseCoverageReport(format, content);
      if (totals) return totals;
    }
  }
  return null;
}
