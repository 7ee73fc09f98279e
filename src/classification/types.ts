export const LAYERS = ['unit', 'integration', 'e2e'] as const;

export type Layer = (typeof LAYERS)[number];

export interface SourceFile {
  /** Absolute path on disk. */
  path: string;
  /** Path relative to the repository root, POSIX separators. */
  relativePath: string;
  /** Lower-cased, including the dot (`.py`). */
  extension: string;
  /** Read once; shared read-only by every analysis of this file. */
  content: string;
}

export interface TestFunction {
  readonly name: string;
  /** Relative path of the owning file. */
  readonly file: string;
  /** 1-based. */
  readonly line: number;
  /** Declaration rule that produced this entry. */
  readonly rule: string;
}

export interface Classification {
  /** Every layer whose identity signals matched, in LAYERS order. */
  layers: Layer[];
  /** Layer the functions are attributed to; null when the file is not a test file. */
  primaryLayer: Layer | null;
  functions: TestFunction[];
  /** Ids of the rules that matched, for diagnostics. */
  matchedRules: string[];
}

export interface ClassifiedFile {
  file: Pick<SourceFile, 'path' | 'relativePath' | 'extension'>;
  layers: Layer[];
  primaryLayer: Layer;
  functions: TestFunction[];
}

export function emptyByLayer<T>(make: () => T): Record<Layer, T> {
  return { unit: make(), integration: make(), e2e: make() };
}
