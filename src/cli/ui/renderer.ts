import type { CompiledRuleSet } from '../../classification/rules.js';
import { LAYERS } from '../../classification/types.js';
import type { Report } from '../../report/types.js';
import type { TechStack } from '../../stack/types.js';
import { theme, INDENT, RULE_WIDTH } from './theme.js';
import { drawBox, formatMs, keyValue, phaseBanner, safeJson } from './format.js';
import {
  coverageTable,
  duplicatesSummary,
  layerFilesSummary,
  ruleSetSummary,
  stackSummary,
  unmeasuredSummary
} from './sections.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * The Renderer is the single output coordinator for the CLI.
 * All user-facing output routes through it, enabling:
 * - InteractiveRenderer for colored, human-readable output
 * - QuietRenderer for machine-friendly JSON lines (--quiet mode)
 *
 * Results (reports, stack lists, rule summaries) go to the `out` stream;
 * progress and diagnostics go to `err`.
 */
export interface Renderer {
  // ── Results ──
  report(report: Report, info?: { durationMs?: number }): void;
  stacks(root: string, stacks: readonly TechStack[]): void;
  ruleSet(rules: CompiledRuleSet, source: string): void;
  /** Raw JSON document on `out`, for `--json`. */
  json(value: unknown): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;

  spinner(message: string): SpinnerHandle;
}

export interface RendererStreams {
  out?: { write(chunk: string): unknown };
  err?: { write(chunk: string): unknown };
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private out: NonNullable<RendererStreams['out']>;
  private err: NonNullable<RendererStreams['err']>;

  constructor(streams: RendererStreams = {}) {
    this.out = streams.out ?? process.stdout;
    this.err = streams.err ?? process.stderr;
  }

  private writeln(msg: string = ''): void {
    this.out.write(msg + '\n');
  }
  private diag(msg: string = ''): void {
    this.err.write(msg + '\n');
  }

  private section(phase: string): void {
    this.writeln();
    this.writeln(INDENT + phaseBanner(phase));
    this.writeln();
  }

  report(report: Report, info: { durationMs?: number } = {}): void {
    this.writeln();
    this.writeln(keyValue('Repository', report.repositoryRoot));
    const total = LAYERS.reduce((n, l) => n + report.files[l].length, 0);
    this.writeln(keyValue('Test files', String(total)));
    if (info.durationMs != null) this.writeln(keyValue('Duration', formatMs(info.durationMs)));

    this.section('stack');
    this.writeln(stackSummary(report.stacks));

    this.section('layers');
    this.writeln(layerFilesSummary(report.files, report.testCounts));

    this.section('duplicates');
    this.writeln(duplicatesSummary(report.duplicates));

    this.section('coverage');
    this.writeln(coverageTable(report.coverage, report.testCounts));

    const unmeasured = unmeasuredSummary(report.coverageRuns);
    if (unmeasured) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Not measured:')}`);
      this.writeln(unmeasured);
    }
    this.writeln();
  }

  stacks(root: string, stacks: readonly TechStack[]): void {
    this.writeln(keyValue('Repository', root));
    this.writeln();
    this.writeln(stackSummary(stacks));
    this.writeln();
  }

  ruleSet(rules: CompiledRuleSet, source: string): void {
    this.writeln(drawBox('Rule Set', ruleSetSummary(rules, source), RULE_WIDTH));
  }

  json(value: unknown): void {
    this.out.write(safeJson(value) + '\n');
  }

  error(title: string, details: string, tip?: string): void {
    this.diag();
    this.diag(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.diag();
    for (const line of details.split('\n')) {
      this.diag(`${INDENT}${line}`);
    }
    if (tip) {
      this.diag();
      this.diag(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.diag();
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private out: NonNullable<RendererStreams['out']>;
  private err: NonNullable<RendererStreams['err']>;

  constructor(streams: RendererStreams = {}) {
    this.out = streams.out ?? process.stdout;
    this.err = streams.err ?? process.stderr;
  }

  private emit(type: string, data: Record<string, unknown> = {}, stream = this.err): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    stream.write(JSON.stringify(event) + '\n');
  }

  report(report: Report, info: { durationMs?: number } = {}): void {
    this.emit('report', { durationMs: info.durationMs, report }, this.out);
  }

  stacks(root: string, stacks: readonly TechStack[]): void {
    this.emit('stacks', { root, stacks }, this.out);
  }

  ruleSet(rules: CompiledRuleSet, source: string): void {
    this.emit(
      'rule_set',
      {
        source,
        version: rules.version,
        extensions: [...rules.extensions],
        identity: Object.fromEntries(LAYERS.map((l) => [l, rules.identity[l].map((r) => r.id)])),
        declarations: rules.declarations.map((d) => d.id)
      },
      this.out
    );
  }

  json(value: unknown): void {
    this.out.write(JSON.stringify(value) + '\n');
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('progress', { message });
    return {
      update: (text) => this.emit('progress', { message: text }),
      succeed: (text) => this.emit('progress', { message: text, status: 'ok' }),
      fail: (text) => this.emit('progress', { message: text, status: 'failed' })
    };
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.TESTLAYERS_QUIET === '1'
      ? new QuietRenderer()
      : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing or --quiet mode).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
