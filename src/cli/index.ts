#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync } from 'node:fs';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runAnalyzeCommand } from './commands/analyze.js';
import { runRulesCommand } from './commands/rules.js';
import { runStackCommand } from './commands/stack.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

export function buildCli(argv: string[]) {
  const program = new Command();

  let globalFlags: { verbose: boolean; quiet: boolean } = { verbose: false, quiet: false };

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('testlayers')
    .description('Classify a repository\'s tests into unit, integration and e2e layers and measure coverage per layer')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();
    globalFlags = { verbose: !!o.verbose, quiet: !!o.quiet };
    process.env.TESTLAYERS_VERBOSE = globalFlags.verbose ? '1' : '0';
    process.env.TESTLAYERS_QUIET = globalFlags.quiet ? '1' : '0';
    createRenderer({ quiet: globalFlags.quiet });
  });

  program
    .command('analyze')
    .description('Classify tests by layer, find cross-layer duplicates and measure coverage')
    .argument('[path]', 'Repository root (defaults to the current directory)')
    .option('--json', 'Print the report as JSON on stdout')
    .option('--no-coverage', 'Skip running coverage tools')
    .option('--no-install', 'Never install dependencies before measuring JS coverage')
    .option('--rules <file>', 'Rule set YAML to use instead of the bundled one')
    .option('--concurrency <n>', 'Files analysed in parallel', parsePositiveInt)
    .option('--timeout <ms>', 'Time limit for each install/test step', parsePositiveInt)
    .action(
      async (
        path: string | undefined,
        opts: { json?: boolean; coverage: boolean; install: boolean; rules?: string; concurrency?: number; timeout?: number }
      ) => {
        const res = await runAnalyzeCommand({
          path,
          json: !!opts.json,
          coverage: opts.coverage,
          install: opts.install,
          rulesPath: opts.rules,
          concurrency: opts.concurrency,
          timeoutMs: opts.timeout
        });
        if (!res.ok) {
          const r = getRenderer();
          r.error('Analysis failed', String(res.details ?? 'unknown error'), 'Run with --verbose for per-file and per-tool diagnostics.');
          process.exitCode = 1;
        }
      }
    );

  program
    .command('rules')
    .description('Validate and summarize the classification rule set')
    .option('--rules <file>', 'Rule set YAML to inspect instead of the bundled one')
    .action(async (opts: { rules?: string }) => {
      const res = await runRulesCommand({ rulesPath: opts.rules });
      if (!res.ok) {
        const r = getRenderer();
        r.error('Invalid rule set', String(res.details ?? 'unknown error'));
        process.exitCode = 1;
      }
    });

  program
    .command('stack')
    .description('Detect the ecosystems and frameworks of a repository')
    .argument('[path]', 'Repository root (defaults to the current directory)')
    .option('--json', 'Print the stacks as JSON on stdout')
    .action(async (path: string | undefined, opts: { json?: boolean }) => {
      const res = await runStackCommand({ path, json: !!opts.json });
      if (!res.ok) {
        const r = getRenderer();
        r.error('Stack detection failed', String(res.details ?? 'unknown error'));
        process.exitCode = 1;
      }
    });

  return program.parseAsync(argv);
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

buildCli(process.argv).catch((err: unknown) => {
  getRenderer().error('Unexpected failure', err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
