import { relative } from 'node:path';

import { emptyByLayer, LAYERS, type ClassifiedFile, type Layer } from '../classification/types.js';
import { walkRepository, type WalkedFile } from '../discovery/walker.js';
import { STACK_SCAN_EXCLUDE } from '../stack/detector.js';
import type { TechStack } from '../stack/types.js';
import { toPosix } from '../utils/fs.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import { ExecaToolRunner, type ToolRunner } from './process.js';
import { addTotals, recordsByLayer, zeroTotals, type CoverageTotals } from './record.js';
import { isWithin } from './toolchains/projects.js';
import { selectToolchains, TOOLCHAINS } from './toolchains/index.js';
import type {
  CoverageResult,
  CoverageRunOutcome,
  CoverageSettings,
  PerLayerToolchain,
  PerProjectToolchain,
  Toolchain,
  ToolchainContext,
  UnitResult
} from './types.js';

export interface CoverageOptions {
  settings: CoverageSettings;
  runner?: ToolRunner;
  logger?: Logger;
  /** Repository listing used to find sub-project manifests; walked when omitted. */
  files?: readonly WalkedFile[];
  toolchains?: readonly Toolchain[];
}

type LayerTotals = Record<Layer, CoverageTotals>;

/**
 * Measure line coverage per layer with the toolchains serving the detected
 * stacks. Toolchains run concurrently; runs inside one toolchain are sequential,
 * and runs against the same directory never overlap. A unit that fails, times
 * out or cannot start contributes nothing and is listed in `runs`.
 */
export async function runCoverage(
  root: string,
  classified: readonly ClassifiedFile[],
  stacks: readonly TechStack[],
  opts: CoverageOptions
): Promise<CoverageResult> {
  const log = (opts.logger ?? defaultLogger()).child('coverage');
  const { toolchains, unserved } = selectToolchains(stacks, opts.toolchains ?? TOOLCHAINS);
  const lock = new KeyedLock();
  const runner = opts.runner ?? new ExecaToolRunner();

  const runs: CoverageRunOutcome[] = unserved.map((ecosystem): CoverageRunOutcome => ({
    toolchain: ecosystem,
    directory: '.',
    status: 'skipped',
    reason: `no coverage toolchain for ${ecosystem}`
  }));

  if (toolchains.length === 0) {
    log.debug('No coverage toolchain applies');
    return { byLayer: recordsByLayer(emptyByLayer(zeroTotals)), runs };
  }

  const files = opts.files ?? (await walkRepository(root, { exclude: STACK_SCAN_EXCLUDE, logger: log }));

  const perToolchain = await Promise.all(
    toolchains.map((t) => {
      const ctx: ToolchainContext = { root, runner, settings: opts.settings, logger: log.child(t.id), lock };
      const own = classified.filter((f) => t.extensions.includes(f.file.extension));
      return t.strategy === 'per-layer' ? runPerLayer(ctx, t, own) : runPerProject(ctx, t, own, files);
    })
  );

  const totals = emptyByLayer(zeroTotals);
  for (const result of perToolchain) {
    for (const layer of LAYERS) totals[layer] = addTotals(totals[layer], result.totals[layer]);
    runs.push(...result.runs);
  }

  return { byLayer: recordsByLayer(totals), runs };
}

interface ToolchainRun {
  totals: LayerTotals;
  runs: CoverageRunOutcome[];
}

async function runPerLayer(ctx: ToolchainContext, t: PerLayerToolchain, own: readonly ClassifiedFile[]): Promise<ToolchainRun> {
  const totals = emptyByLayer(zeroTotals);
  const runs: CoverageRunOutcome[] = [];

  for (const layer of LAYERS) {
    const layerFiles = own.filter((f) => f.primaryLayer === layer);
    if (layerFiles.length === 0) continue;
    const otherFiles = own.filter((f) => f.primaryLayer !== layer);

    const result = await guarded(() => t.runLayer(ctx, layer, layerFiles, otherFiles));
    const outcome = toOutcome(t, '.', result, layer);
    runs.push(outcome);
    report(ctx, outcome);
    if (result.status === 'ok') totals[layer] = result.totals;
  }

  return { totals, runs };
}

async function runPerProject(
  ctx: ToolchainContext,
  t: PerProjectToolchain,
  own: readonly ClassifiedFile[],
  files: readonly WalkedFile[]
): Promise<ToolchainRun> {
  const totals = emptyByLayer(zeroTotals);
  const runs: CoverageRunOutcome[] = [];

  let projects: string[];
  try {
    projects = await t.findProjects(ctx.root, files);
  } catch (err) {
    const reason = `could not list projects: ${errorMessage(err)}`;
    ctx.logger.warn(reason);
    return { totals, runs: [{ toolchain: t.id, strategy: t.strategy, directory: '.', status: 'failed', reason }] };
  }

  const counts = countFilesByProject(projects, own);

  for (const dir of projects) {
    const directory = toPosix(relative(ctx.root, dir)) || '.';
    const byLayer = counts.get(dir) ?? emptyByLayer(() => 0);
    const fileCount = LAYERS.reduce((n, l) => n + byLayer[l], 0);

    if (fileCount === 0) {
      runs.push({ toolchain: t.id, strategy: t.strategy, directory, status: 'skipped', reason: 'no test files in project' });
      continue;
    }

    const result = await guarded(() => t.runProject(ctx, dir));
    const outcome = toOutcome(t, directory, result);
    runs.push(outcome);
    report(ctx, outcome);
    if (result.status !== 'ok') continue;

    const shares = attributeProjectCoverage(result.totals, byLayer);
    for (const layer of LAYERS) totals[layer] = addTotals(totals[layer], shares[layer]);
  }

  return { totals, runs };
}

/**
 * Spread one project's totals over layers by their share of its test files:
 * `covered = round(projectCovered × share)`, `total = projectTotal`. Layers with
 * no test files in the project get nothing.
 */
export function attributeProjectCoverage(project: CoverageTotals, fileCounts: Record<Layer, number>): LayerTotals {
  const out = emptyByLayer(zeroTotals);
  const all = LAYERS.reduce((n, l) => n + fileCounts[l], 0);
  if (all === 0) return out;

  for (const layer of LAYERS) {
    if (fileCounts[layer] === 0) continue;
    const share = fileCounts[layer] / all;
    out[layer] = { covered: Math.round(project.covered * share), total: project.total };
  }
  return out;
}

/** Each test file counts toward the deepest project directory containing it. */
export function countFilesByProject(projects: readonly string[], files: readonly ClassifiedFile[]): Map<string, Record<Layer, number>> {
  const out = new Map<string, Record<Layer, number>>();
  const deepestFirst = [...projects].sort((a, b) => b.length - a.length);

  for (const f of files) {
    const owner = deepestFirst.find((dir) => isWithin(dir, f.file.path));
    if (!owner) continue;
    const counts = out.get(owner) ?? emptyByLayer(() => 0);
    counts[f.primaryLayer] += 1;
    out.set(owner, counts);
  }
  return out;
}

async function guarded(fn: () => Promise<UnitResult>): Promise<UnitResult> {
  try {
    return await fn();
  } catch (err) {
    return { status: 'failed', reason: errorMessage(err) };
  }
}

function toOutcome(t: Toolchain, directory: string, result: UnitResult, layer?: Layer): CoverageRunOutcome {
  const base = { toolchain: t.id, strategy: t.strategy, directory, ...(layer ? { layer } : {}) };
  return result.status === 'ok'
    ? { ...base, status: 'ok', measured: { ...result.totals } }
    : { ...base, status: result.status, reason: result.reason };
}

function report(ctx: ToolchainContext, outcome: CoverageRunOutcome) {
  const where = outcome.layer ? `${outcome.directory} (${outcome.layer})` : outcome.directory;
  if (outcome.status === 'ok') {
    ctx.logger.info(`Measured ${where}`, outcome.measured);
  } else if (outcome.status === 'skipped') {
    ctx.logger.info(`Skipped ${where}: ${outcome.reason ?? ''}`);
  } else {
    ctx.logger.warn(`No coverage from ${where}: ${outcome.reason ?? outcome.status}`);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
