import type { DuplicateEntry } from '../analysis/duplicates.js';
import type { ClassifiedFile, Layer } from '../classification/types.js';
import type { CoverageRecord } from '../coverage/record.js';
import type { CoverageRunOutcome } from '../coverage/types.js';
import type { TechStack } from '../stack/types.js';

/**
 * Result of one analysis run. Plain data with no cycles, so `JSON.stringify`
 * is its serialized form.
 */
export interface Report {
  readonly repositoryRoot: string;
  /** Each test file appears once, under its primary layer, sorted by relative path. */
  readonly files: Readonly<Record<Layer, readonly ClassifiedFile[]>>;
  /** Test functions attributed to each layer. */
  readonly testCounts: Readonly<Record<Layer, number>>;
  readonly duplicates: readonly DuplicateEntry[];
  readonly coverage: Readonly<Record<Layer, CoverageRecord>>;
  readonly stacks: readonly TechStack[];
  readonly coverageRuns: readonly CoverageRunOutcome[];
}
