import { describe, expect, it } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { utimes } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import type { ClassifiedFile, Layer } from '../src/classification/types.js';
import { attributeProjectCoverage, countFilesByProject, runCoverage } from '../src/coverage/orchestrator.js';
import type { CoverageSettings } from '../src/coverage/types.js';
import type { TechStack } from '../src/stack/types.js';
import { toPosix } from '../src/utils/fs.js';
import { Logger } from '../src/utils/logger.js';
import { coveragePyTable, FakeToolRunner, type FakeResponse } from './fake-tool-runner.js';
import { createTempRepo } from './repo-fixture.js';

const settings: CoverageSettings = { testTimeoutMs: 300_000, reportTimeoutMs: 30_000, pythonCommand: 'python3', install: false };
const logger = new Logger({ level: 'silent' });

const python: TechStack = { ecosystem: 'python', label: 'python' };
const javascript: TechStack = { ecosystem: 'javascript', label: 'javascript' };

function classifiedAt(root: string, relativePath: string, primaryLayer: Layer): ClassifiedFile {
  return {
    file: { path: join(root, ...relativePath.split('/')), relativePath, extension: relativePath.slice(relativePath.lastIndexOf('.')) },
    layers: [primaryLayer],
    primaryLayer,
    functions: []
  };
}

/** Answers a vitest coverage run by writing a json-summary into its reports directory. */
function vitestSummary(covered: number, total: number) {
  return (args: readonly string[]): FakeResponse => {
    const flag = '--coverage.reportsDirectory=';
    const dir = args.find((a) => a.startsWith(flag))?.slice(flag.length);
    if (!dir) return { status: 'failed', stderr: 'unexpected command' };
    const summary = JSON.stringify({ total: { lines: { total, covered, skipped: 0, pct: 0 } } });
    return { status: 'ok', writes: { [join(dir, 'coverage-summary.json')]: summary } };
  };
}

const vitestPackage = JSON.stringify({ scripts: { test: 'vitest run' }, devDependencies: { vitest: '^2.1.0' } });

describe('runCoverage', () => {
  it('returns all-zero coverage without running anything when no stack is detected', async () => {
    const { dir } = await createTempRepo({ 'tests/test_a.py': '' });
    const runner = new FakeToolRunner(() => ({ status: 'ok' }));
    const result = await runCoverage(dir, [classifiedAt(dir, 'tests/test_a.py', 'unit')], [], { settings, runner, logger });
    expect(result.byLayer).toEqual({
      unit: { covered: 0, total: 0, percentage: 0 },
      integration: { covered: 0, total: 0, percentage: 0 },
      e2e: { covered: 0, total: 0, percentage: 0 }
    });
    expect(result.runs).toEqual([]);
    expect(runner.calls).toEqual([]);
  });

  it('runs python once per layer with the other layers omitted and cleans up the rcfile', async () => {
    const { dir } = await createTempRepo({ 'tests/test_a.py': '', 'tests/integration/test_b.py': '' });
    const unitFile = classifiedAt(dir, 'tests/test_a.py', 'unit');
    const integrationFile = classifiedAt(dir, 'tests/integration/test_b.py', 'integration');

    const rcfiles: Array<{ path: string; content: string }> = [];
    const tables = [coveragePyTable(10, 2), coveragePyTable(20, 10)];
    const runner = new FakeToolRunner((inv) => {
      if (inv.args[2] === 'run') {
        const path = inv.args[3].slice('--rcfile='.length);
        rcfiles.push({ path, content: readFileSync(path, 'utf8') });
        return { status: 'ok' };
      }
      return { status: 'ok', stdout: tables.shift() ?? '' };
    });

    const result = await runCoverage(dir, [unitFile, integrationFile], [python], { settings, runner, logger });

    expect(result.byLayer.unit).toEqual({ covered: 8, total: 10, percentage: 80 });
    expect(result.byLayer.integration).toEqual({ covered: 10, total: 20, percentage: 50 });
    expect(result.byLayer.e2e).toEqual({ covered: 0, total: 0, percentage: 0 });

    expect(runner.calls.map((c) => [c.command, ...c.args.slice(0, 3)].join(' '))).toEqual([
      'python3 -m coverage run',
      'python3 -m coverage report',
      'python3 -m coverage run',
      'python3 -m coverage report'
    ]);
    expect(runner.calls[0].args.slice(-1)).toEqual(['tests/test_a.py']);
    expect(runner.calls[2].args.slice(-1)).toEqual(['tests/integration/test_b.py']);
    expect(runner.calls[0].timeoutMs).toBe(300_000);
    expect(runner.calls[1].timeoutMs).toBe(30_000);

    expect(rcfiles[0].content).toContain(`source = ${toPosix(dir)}`);
    expect(rcfiles[0].content).toContain(`    ${toPosix(integrationFile.file.path)}\n`);
    expect(rcfiles[0].content).not.toContain(toPosix(unitFile.file.path));
    expect(rcfiles[1].content).toContain(`    ${toPosix(unitFile.file.path)}\n`);
    for (const rc of rcfiles) expect(existsSync(rc.path)).toBe(false);

    expect(result.runs.map((r) => [r.toolchain, r.strategy, r.directory, r.layer, r.status])).toEqual([
      ['python', 'per-layer', '.', 'unit', 'ok'],
      ['python', 'per-layer', '.', 'integration', 'ok']
    ]);
  });

  it('spreads a project run over layers by their share of test files', async () => {
    const { dir } = await createTempRepo({ 'package.json': vitestPackage, 'node_modules/vitest/package.json': '{}' });
    const files = [
      classifiedAt(dir, 'src/a.test.ts', 'unit'),
      classifiedAt(dir, 'src/b.test.ts', 'unit'),
      classifiedAt(dir, 'src/c.test.ts', 'unit'),
      classifiedAt(dir, 'tests/integration/api.test.ts', 'integration')
    ];
    const summary = vitestSummary(50, 80);
    const runner = new FakeToolRunner((inv) => summary(inv.args));

    const result = await runCoverage(dir, files, [javascript], { settings, runner, logger });

    expect(result.byLayer.unit).toMatchObject({ covered: 38, total: 80 });
    expect(result.byLayer.unit.percentage).toBeCloseTo(47.5, 10);
    expect(result.byLayer.integration).toMatchObject({ covered: 13, total: 80 });
    expect(result.byLayer.integration.percentage).toBeCloseTo(16.25, 10);
    expect(result.byLayer.e2e).toEqual({ covered: 0, total: 0, percentage: 0 });
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].command).toBe('npx');
    expect(runner.calls[0].args.slice(0, 3)).toEqual(['--no-install', 'vitest', 'run']);
    expect(result.runs).toEqual([
      { toolchain: 'node', strategy: 'per-project', directory: '.', status: 'ok', measured: { covered: 50, total: 80 } }
    ]);
  });

  it('records a timed-out project as zero coverage and keeps going', async () => {
    const { dir } = await createTempRepo({ 'package.json': vitestPackage, 'node_modules/vitest/package.json': '{}' });
    const runner = new FakeToolRunner(() => ({ status: 'timed_out' }));

    const result = await runCoverage(dir, [classifiedAt(dir, 'src/a.test.ts', 'unit')], [javascript], { settings, runner, logger });

    expect(result.byLayer.unit).toEqual({ covered: 0, total: 0, percentage: 0 });
    expect(result.runs).toHaveLength(1);
    expect(result.runs[0].status).toBe('timed_out');
    expect(result.runs[0].reason).toMatch(/^npx --no-install vitest run .* timed out after 300000ms$/);
  });

  it('records a missing tool as a failed unit', async () => {
    const { dir } = await createTempRepo({ 'go.mod': 'module example.com/shop\n', 'cart_test.go': '' });
    const runner = new FakeToolRunner(() => ({ status: 'not_found', message: 'spawn go ENOENT' }));

    const result = await runCoverage(dir, [classifiedAt(dir, 'cart_test.go', 'unit')], [{ ecosystem: 'go', label: 'go' }], {
      settings,
      runner,
      logger
    });

    expect(result.byLayer.unit.total).toBe(0);
    expect(result.runs).toHaveLength(1);
    expect(result.runs[0]).toMatchObject({ toolchain: 'go', status: 'failed' });
    expect(result.runs[0].reason).toMatch(/^go test -coverprofile=.*cover\.out \.\/\.\.\.: spawn go ENOENT$/);
  });

  it('measures a go module from its cover profile', async () => {
    const { dir } = await createTempRepo({ 'go.mod': 'module example.com/shop\n', 'cart_test.go': '' });
    const runner = new FakeToolRunner((inv) => {
      const profile = inv.args[1].slice('-coverprofile='.length);
      return { status: 'ok', writes: { [profile]: 'mode: set\nexample.com/shop/cart.go:1.1,2.2 4 1\nexample.com/shop/cart.go:3.1,4.2 1 0\n' } };
    });

    const result = await runCoverage(dir, [classifiedAt(dir, 'cart_test.go', 'integration')], [{ ecosystem: 'go', label: 'go' }], {
      settings,
      runner,
      logger
    });

    expect(result.byLayer.integration).toEqual({ covered: 4, total: 5, percentage: 80 });
  });

  it('skips ecosystems without a toolchain and projects without test files', async () => {
    const { dir } = await createTempRepo({ 'package.json': vitestPackage, 'node_modules/vitest/package.json': '{}' });
    const runner = new FakeToolRunner(() => ({ status: 'ok' }));

    const result = await runCoverage(dir, [], [javascript, { ecosystem: 'ruby', label: 'ruby' }], { settings, runner, logger });

    expect(runner.calls).toEqual([]);
    expect(result.runs).toEqual([
      { toolchain: 'ruby', directory: '.', status: 'skipped', reason: 'no coverage toolchain for ruby' },
      { toolchain: 'node', strategy: 'per-project', directory: '.', status: 'skipped', reason: 'no test files in project' }
    ]);
  });

  it('ignores package.json files whose test script is the npm placeholder', async () => {
    const { dir } = await createTempRepo({
      'package.json': JSON.stringify({ scripts: { test: 'echo "Error: no test specified" && exit 1' } })
    });
    const runner = new FakeToolRunner(() => ({ status: 'ok' }));
    const result = await runCoverage(dir, [classifiedAt(dir, 'a.test.js', 'unit')], [javascript], { settings, runner, logger });
    expect(result.runs).toEqual([]);
    expect(runner.calls).toEqual([]);
  });

  it('installs dependencies first when node_modules is missing', async () => {
    const { dir } = await createTempRepo({ 'package.json': vitestPackage, 'package-lock.json': '{}' });
    const summary = vitestSummary(1, 2);
    const runner = new FakeToolRunner((inv) => (inv.command === 'npm' ? { status: 'ok' } : summary(inv.args)));

    const result = await runCoverage(dir, [classifiedAt(dir, 'a.test.ts', 'unit')], [javascript], {
      settings: { ...settings, install: true },
      runner,
      logger
    });

    expect(runner.calls.map((c) => `${c.command} ${c.args[0]}`)).toEqual(['npm ci', 'npx --no-install']);
    expect(result.byLayer.unit).toEqual({ covered: 1, total: 2, percentage: 50 });
  });

  it('skips a project without node_modules when installs are disabled', async () => {
    const { dir } = await createTempRepo({ 'package.json': vitestPackage });
    const runner = new FakeToolRunner(() => ({ status: 'ok' }));
    const result = await runCoverage(dir, [classifiedAt(dir, 'a.test.ts', 'unit')], [javascript], { settings, runner, logger });
    expect(runner.calls).toEqual([]);
    expect(result.runs[0]).toMatchObject({ toolchain: 'node', status: 'skipped', reason: 'node_modules missing and installs are disabled' });
  });

  it('never runs two tools in the same directory at once', async () => {
    const { dir } = await createTempRepo({ 'package.json': vitestPackage, 'node_modules/vitest/package.json': '{}' });
    const summary = vitestSummary(1, 1);
    const runner = new FakeToolRunner((inv) => {
      if (inv.command === 'npx') return summary(inv.args);
      return inv.args[2] === 'report' ? { status: 'ok', stdout: coveragePyTable(4, 1) } : { status: 'ok' };
    }, 20);

    await runCoverage(
      dir,
      [classifiedAt(dir, 'tests/test_a.py', 'unit'), classifiedAt(dir, 'tests/b.test.ts', 'unit')],
      [python, javascript],
      { settings, runner, logger }
    );

    expect(runner.calls).toHaveLength(3);
    expect(runner.maxConcurrentByCwd.get(dir)).toBe(1);
  });
});

describe('attributeProjectCoverage', () => {
  it('gives nothing to layers without files in the project', () => {
    expect(attributeProjectCoverage({ covered: 9, total: 10 }, { unit: 2, integration: 0, e2e: 1 })).toEqual({
      unit: { covered: 6, total: 10 },
      integration: { covered: 0, total: 0 },
      e2e: { covered: 3, total: 10 }
    });
  });

  it('contributes nothing when the project has no test files', () => {
    expect(attributeProjectCoverage({ covered: 9, total: 10 }, { unit: 0, integration: 0, e2e: 0 })).toEqual({
      unit: { covered: 0, total: 0 },
      integration: { covered: 0, total: 0 },
      e2e: { covered: 0, total: 0 }
    });
  });
});

describe('countFilesByProject', () => {
  it('assigns each file to the deepest project containing it', () => {
    const root = '/repo';
    const counts = countFilesByProject(
      [join(root), join(root, 'packages', 'web')],
      [
        classifiedAt(root, 'packages/web/src/a.test.ts', 'unit'),
        classifiedAt(root, 'packages/web/e2e/flow.spec.ts', 'e2e'),
        classifiedAt(root, 'scripts/tool.test.js', 'unit'),
        classifiedAt(root, 'packages/webapp/x.test.js', 'integration')
      ]
    );
    expect(counts.get(join(root, 'packages', 'web'))).toEqual({ unit: 1, integration: 0, e2e: 1 });
    expect(counts.get(join(root))).toEqual({ unit: 1, integration: 1, e2e: 0 });
  });
});

describe('python layer runs', () => {
  const layerFile = (dir: string) => classifiedAt(dir, 'tests/test_a.py', 'unit');

  function capturingRcfile(answer: FakeResponse) {
    const rcfiles: string[] = [];
    const runner = new FakeToolRunner((inv) => {
      const flag = inv.args.find((a) => a.startsWith('--rcfile='));
      if (flag) rcfiles.push(flag.slice('--rcfile='.length));
      return answer;
    });
    return { runner, rcfiles };
  }

  it('removes the rcfile directory when the test run fails', async () => {
    const { dir } = await createTempRepo({ 'tests/test_a.py': '' });
    const { runner, rcfiles } = capturingRcfile({ status: 'failed', exitCode: 1 });

    const result = await runCoverage(dir, [layerFile(dir)], [python], { settings, runner, logger });

    expect(result.runs).toHaveLength(1);
    expect(result.runs[0]).toMatchObject({ toolchain: 'python', layer: 'unit', status: 'failed' });
    expect(result.runs[0].reason).toMatch(/exited with code 1$/);
    expect(runner.calls).toHaveLength(1);
    expect(rcfiles).toHaveLength(1);
    expect(existsSync(dirname(rcfiles[0]))).toBe(false);
  });

  it('removes the rcfile directory when the test run times out', async () => {
    const { dir } = await createTempRepo({ 'tests/test_a.py': '' });
    const { runner, rcfiles } = capturingRcfile({ status: 'timed_out' });

    const result = await runCoverage(dir, [layerFile(dir)], [python], { settings, runner, logger });

    expect(result.runs[0]).toMatchObject({ toolchain: 'python', layer: 'unit', status: 'timed_out' });
    expect(result.byLayer.unit).toEqual({ covered: 0, total: 0, percentage: 0 });
    expect(rcfiles).toHaveLength(1);
    expect(existsSync(dirname(rcfiles[0]))).toBe(false);
  });
});

describe('node coverage artifacts', () => {
  const mochaPackage = JSON.stringify({ scripts: { test: 'mocha' }, devDependencies: { mocha: '^10.0.0' } });
  const summary = (covered: number, total: number) => JSON.stringify({ total: { lines: { total, covered, skipped: 0, pct: 0 } } });
  const longAgo = new Date('2020-01-01T00:00:00Z');

  it('ignores a coverage summary left over from an earlier run', async () => {
    const { dir } = await createTempRepo({
      'package.json': mochaPackage,
      'node_modules/mocha/package.json': '{}',
      'coverage/coverage-summary.json': summary(99, 100),
      'coverage/lcov.info': 'SF:a.js\nLF:100\nLH:99\nend_of_record\n'
    });
    await utimes(join(dir, 'coverage', 'coverage-summary.json'), longAgo, longAgo);
    await utimes(join(dir, 'coverage', 'lcov.info'), longAgo, longAgo);
    const runner = new FakeToolRunner(() => ({ status: 'ok' }));

    const result = await runCoverage(dir, [classifiedAt(dir, 'test/a.test.js', 'unit')], [javascript], { settings, runner, logger });

    expect(runner.calls.map((c) => [c.command, ...c.args].join(' '))).toEqual(['npm test -- --coverage']);
    expect(result.byLayer.unit).toEqual({ covered: 0, total: 0, percentage: 0 });
    expect(result.runs).toEqual([
      { toolchain: 'node', strategy: 'per-project', directory: '.', status: 'failed', reason: 'no coverage summary was written' }
    ]);
  });

  it('reads the summary a plain npm test run writes to ./coverage', async () => {
    const { dir } = await createTempRepo({ 'package.json': mochaPackage, 'node_modules/mocha/package.json': '{}' });
    const runner = new FakeToolRunner((inv) => ({
      status: 'ok',
      writes: { [join(inv.cwd, 'coverage', 'coverage-summary.json')]: summary(3, 4) }
    }));

    const result = await runCoverage(dir, [classifiedAt(dir, 'test/a.test.js', 'unit')], [javascript], { settings, runner, logger });

    expect(result.byLayer.unit).toEqual({ covered: 3, total: 4, percentage: 75 });
  });

  it('reads vitest results only from the directory it was told to write to', async () => {
    const { dir } = await createTempRepo({
      'package.json': vitestPackage,
      'node_modules/vitest/package.json': '{}',
      'coverage/coverage-summary.json': summary(99, 100)
    });
    const runner = new FakeToolRunner(() => ({ status: 'ok' }));

    const result = await runCoverage(dir, [classifiedAt(dir, 'src/a.test.ts', 'unit')], [javascript], { settings, runner, logger });

    expect(result.byLayer.unit.total).toBe(0);
    expect(result.runs[0]).toMatchObject({ status: 'failed', reason: 'no coverage summary was written' });
  });
});

describe('jvm and dotnet projects', () => {
  const java: TechStack = { ecosystem: 'java', label: 'java' };
  const csharp: TechStack = { ecosystem: 'csharp', label: 'csharp' };
  const jacoco = (missed: number, covered: number) =>
    `<report name="shop"><package name="shop"></package><counter type="INSTRUCTION" missed="40" covered="60"/><counter type="LINE" missed="${missed}" covered="${covered}"/></report>`;

  it('runs the maven wrapper once and sums every module report', async () => {
    const { dir } = await createTempRepo({
      'pom.xml': '<project/>',
      'mvnw': '#!/bin/sh\n',
      'core/pom.xml': '<project/>',
      'web/pom.xml': '<project/>'
    });
    const runner = new FakeToolRunner((inv) => ({
      status: 'ok',
      writes: {
        [join(inv.cwd, 'core', 'target', 'site', 'jacoco', 'jacoco.xml')]: jacoco(2, 8),
        [join(inv.cwd, 'web', 'target', 'site', 'jacoco', 'jacoco.xml')]: jacoco(5, 5)
      }
    }));
    const files = [
      classifiedAt(dir, 'core/src/test/java/shop/CartTest.java', 'unit'),
      classifiedAt(dir, 'web/src/test/java/shop/ApiIT.java', 'integration')
    ];

    const result = await runCoverage(dir, files, [java], { settings, runner, logger });

    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].command).toBe(join(dir, 'mvnw'));
    expect(runner.calls[0].cwd).toBe(dir);
    expect(runner.calls[0].args).toEqual([
      '-B',
      '-q',
      'org.jacoco:jacoco-maven-plugin:prepare-agent',
      'test',
      'org.jacoco:jacoco-maven-plugin:report'
    ]);
    expect(result.runs).toEqual([
      { toolchain: 'maven', strategy: 'per-project', directory: '.', status: 'ok', measured: { covered: 13, total: 20 } }
    ]);
    expect(result.byLayer.unit).toMatchObject({ covered: 7, total: 20 });
    expect(result.byLayer.integration).toMatchObject({ covered: 7, total: 20 });
  });

  it('falls back to a global gradle and reads its JaCoCo report', async () => {
    const { dir } = await createTempRepo({ 'build.gradle': "plugins { id 'java' }\n" });
    const runner = new FakeToolRunner((inv) => ({
      status: 'ok',
      writes: { [join(inv.cwd, 'build', 'reports', 'jacoco', 'test', 'jacocoTestReport.xml')]: jacoco(2, 8) }
    }));

    const result = await runCoverage(dir, [classifiedAt(dir, 'src/test/java/AppTest.java', 'unit')], [java], {
      settings,
      runner,
      logger
    });

    expect(runner.calls.map((c) => [c.command, ...c.args].join(' '))).toEqual(['gradle --no-daemon -q test jacocoTestReport']);
    expect(result.byLayer.unit).toEqual({ covered: 8, total: 10, percentage: 80 });
  });

  it('fails a jvm project whose build wrote no report', async () => {
    const { dir } = await createTempRepo({ 'build.gradle': '' });
    const runner = new FakeToolRunner(() => ({ status: 'ok' }));

    const result = await runCoverage(dir, [classifiedAt(dir, 'src/test/java/AppTest.java', 'unit')], [java], {
      settings,
      runner,
      logger
    });

    expect(result.byLayer.unit.total).toBe(0);
    expect(result.runs).toEqual([
      {
        toolchain: 'gradle',
        strategy: 'per-project',
        directory: '.',
        status: 'failed',
        reason: 'no JaCoCo report matching build/reports/jacoco/test/jacocoTestReport.xml'
      }
    ]);
  });

  it('reads the Cobertura report coverlet writes under the results directory', async () => {
    const { dir } = await createTempRepo({ 'Shop.sln': '', 'tests/Shop.Tests/Shop.Tests.csproj': '<Project/>' });
    const resultsDirs: string[] = [];
    const runner = new FakeToolRunner((inv) => {
      const results = inv.args[inv.args.indexOf('--results-directory') + 1];
      resultsDirs.push(results);
      const xml = '<?xml version="1.0"?>\n<coverage line-rate="0.75" lines-covered="30" lines-valid="40" version="1.9"><packages/></coverage>';
      return { status: 'ok', writes: { [join(results, '0b1c2d3e', 'coverage.cobertura.xml')]: xml } };
    });

    const result = await runCoverage(dir, [classifiedAt(dir, 'tests/Shop.Tests/CartTests.cs', 'unit')], [csharp], {
      settings,
      runner,
      logger
    });

    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].command).toBe('dotnet');
    expect(runner.calls[0].cwd).toBe(dir);
    expect(runner.calls[0].args).toContain('--collect:XPlat Code Coverage');
    expect(result.byLayer.unit).toEqual({ covered: 30, total: 40, percentage: 75 });
    expect(existsSync(resultsDirs[0])).toBe(false);
  });

  it('fails a dotnet project whose test run wrote no report', async () => {
    const { dir } = await createTempRepo({ 'Shop.Tests.csproj': '<Project/>' });
    const runner = new FakeToolRunner(() => ({ status: 'ok' }));

    const result = await runCoverage(dir, [classifiedAt(dir, 'CartTests.cs', 'unit')], [csharp], { settings, runner, logger });

    expect(result.runs[0]).toMatchObject({ toolchain: 'dotnet', status: 'failed', reason: 'dotnet test wrote no Cobertura report' });
  });
});
