export interface AnalysisSettings {
  /** Worker pool size for per-file analysis. */
  concurrency: number;
  /** Bound for install, build and test steps. */
  testTimeoutMs: number;
  /** Bound for lightweight report steps. */
  reportTimeoutMs: number;
  /** Interpreter used to run coverage.py. */
  pythonCommand: string;
}

const DEFAULT_CONCURRENCY = 4;
const MAX_CONCURRENCY = 32;
const DEFAULT_TEST_TIMEOUT_MS = 300_000;
const MIN_TEST_TIMEOUT_MS = 10_000;
const DEFAULT_REPORT_TIMEOUT_MS = 30_000;
const MIN_REPORT_TIMEOUT_MS = 1_000;

export function resolveConcurrency(raw: string | undefined): number {
  const n = parseIntegerish(raw);
  if (n === null) return DEFAULT_CONCURRENCY;
  if (n < 1) return 1;
  return Math.min(n, MAX_CONCURRENCY);
}

export function resolveTestTimeoutMs(raw: string | undefined): number {
  return resolveTimeout(raw, DEFAULT_TEST_TIMEOUT_MS, MIN_TEST_TIMEOUT_MS);
}

export function resolveReportTimeoutMs(raw: string | undefined): number {
  return resolveTimeout(raw, DEFAULT_REPORT_TIMEOUT_MS, MIN_REPORT_TIMEOUT_MS);
}

export function resolveSettings(env: NodeJS.ProcessEnv = process.env): AnalysisSettings {
  const python = env.TESTLAYERS_PYTHON?.trim();
  return {
    concurrency: resolveConcurrency(env.TESTLAYERS_CONCURRENCY),
    testTimeoutMs: resolveTestTimeoutMs(env.TESTLAYERS_TEST_TIMEOUT_MS),
    reportTimeoutMs: resolveReportTimeoutMs(env.TESTLAYERS_REPORT_TIMEOUT_MS),
    pythonCommand: python ? python : 'python3'
  };
}

function resolveTimeout(raw: string | undefined, fallback: number, min: number): number {
  const ms = parseIntegerish(raw);
  if (ms === null) return fallback;
  return ms < min ? min : ms;
}

function parseIntegerish(raw: string | undefined): number | null {
  if (!raw || !raw.trim()) return null;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return null;
  return Math.floor(parsed);
}
