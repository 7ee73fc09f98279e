import type { ClassifiedFile, Layer } from '../classification/types.js';
import type { WalkedFile } from '../discovery/walker.js';
import type { Ecosystem } from '../stack/types.js';
import type { KeyedLock } from '../utils/keyed-lock.js';
import type { Logger } from '../utils/logger.js';
import type { ToolRunner } from './process.js';
import type { CoverageRecord, CoverageTotals } from './record.js';

export type CoverageStrategy = 'per-layer' | 'per-project';

export type UnitStatus = 'ok' | 'failed' | 'timed_out' | 'skipped';

/** Result of measuring one unit: a layer run or a sub-project run. */
export type UnitResult =
  | { status: 'ok'; totals: CoverageTotals }
  | UnitFailure;

export interface UnitFailure {
  status: Exclude<UnitStatus, 'ok'>;
  reason: string;
}

export interface CoverageRunOutcome {
  /** Toolchain id, or the ecosystem name when no toolchain serves it. */
  toolchain: string;
  /** Unset when no toolchain serves the ecosystem. */
  strategy?: CoverageStrategy;
  /** Repository-relative directory the tool ran in; `.` for the root. */
  directory: string;
  /** Set for per-layer runs. */
  layer?: Layer;
  status: UnitStatus;
  reason?: string;
  measured?: CoverageTotals;
}

export interface CoverageResult {
  byLayer: Record<Layer, CoverageRecord>;
  runs: CoverageRunOutcome[];
}

export interface CoverageSettings {
  testTimeoutMs: number;
  reportTimeoutMs: number;
  pythonCommand: string;
  /** Install JS dependencies when a sub-project has none. */
  install: boolean;
}

export interface ToolchainContext {
  root: string;
  runner: ToolRunner;
  settings: CoverageSettings;
  logger: Logger;
  lock: KeyedLock;
}

interface ToolchainBase {
  id: string;
  ecosystems: readonly Ecosystem[];
  /** Test files with these extensions belong to this toolchain. */
  extensions: readonly string[];
}

/** Coverage scoped to one layer's test files per run. */
export interface PerLayerToolchain extends ToolchainBase {
  strategy: 'per-layer';
  runLayer(ctx: ToolchainContext, layer: Layer, layerFiles: readonly ClassifiedFile[], otherFiles: readonly ClassifiedFile[]): Promise<UnitResult>;
}

/** One run per sub-project; totals are spread over layers by test-file share. */
export interface PerProjectToolchain extends ToolchainBase {
  strategy: 'per-project';
  /** Absolute directories of runnable sub-projects. */
  findProjects(root: string, files: readonly WalkedFile[]): Promise<string[]>;
  runProject(ctx: ToolchainContext, dir: string): Promise<UnitResult>;
}

export type Toolchain = PerLayerToolchain | PerProjectToolchain;
