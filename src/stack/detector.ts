import { extname } from 'node:path';

import { isRecord, tryReadText } from '../utils/fs.js';
import { defaultLogger, type Logger } from '../utils/logger.js';
import { runPool } from '../utils/worker-pool.js';
import { walkRepository, type WalkedFile } from '../discovery/walker.js';
import { ECOSYSTEMS, stackLabel, type Ecosystem, type TechStack } from './types.js';

/** Dependency and build output only; manifests must stay visible here. */
export const STACK_SCAN_EXCLUDE = [
  '**/node_modules/**',
  '**/bower_components/**',
  '**/vendor/**',
  '**/dist/**',
  '**/build/**',
  '**/target/**',
  '**/coverage/**',
  '**/__pycache__/**',
  '**/venv/**',
  '**/site-packages/**'
] as const;

const BY_EXTENSION: Record<string, Ecosystem> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.kt': 'kotlin',
  '.kts': 'kotlin',
  '.cs': 'csharp',
  '.csproj': 'csharp',
  '.sln': 'csharp',
  '.rb': 'ruby',
  '.go': 'go',
  '.php': 'php'
};

const BY_MARKER: Record<string, Ecosystem> = {
  'package.json': 'javascript',
  'tsconfig.json': 'typescript',
  'pom.xml': 'java',
  'build.gradle': 'java',
  'build.gradle.kts': 'kotlin',
  'go.mod': 'go',
  Gemfile: 'ruby',
  'composer.json': 'php',
  'requirements.txt': 'python',
  'pyproject.toml': 'python',
  'setup.py': 'python',
  Pipfile: 'python'
};

const PYTHON_FRAMEWORKS: Array<{ name: string; re: RegExp }> = [
  { name: 'flask', re: /^\s*(?:from|import)\s+flask\b/m },
  { name: 'django', re: /^\s*(?:from|import)\s+django\b/m },
  { name: 'fastapi', re: /^\s*(?:from|import)\s+fastapi\b/m }
];

const NODE_FRAMEWORKS: Array<{ name: string; dep: string }> = [
  { name: 'react', dep: 'react' },
  { name: 'vue', dep: 'vue' },
  { name: 'angular', dep: '@angular/core' },
  { name: 'next', dep: 'next' },
  { name: 'express', dep: 'express' },
  { name: 'nestjs', dep: '@nestjs/core' }
];

export interface DetectStackOptions {
  logger?: Logger;
  /** Reuse an existing walk of the repository instead of listing it again. */
  files?: readonly WalkedFile[];
}

/**
 * Coarse ecosystem and framework labels for a repository, from file extensions,
 * marker files and a few import/dependency patterns. Sorted by ecosystem, then
 * framework, plain ecosystem labels first.
 */
export async function detectStack(root: string, opts: DetectStackOptions = {}): Promise<TechStack[]> {
  const log = opts.logger ?? defaultLogger();
  const files = opts.files ?? (await walkRepository(root, { exclude: STACK_SCAN_EXCLUDE, logger: log }));

  const ecosystems = new Set<Ecosystem>();
  const frameworks = new Map<string, TechStack>();

  for (const f of files) {
    const byExt = BY_EXTENSION[extname(f.name).toLowerCase()];
    if (byExt) ecosystems.add(byExt);
    const byMarker = BY_MARKER[f.name];
    if (byMarker) ecosystems.add(byMarker);
  }

  const addFramework = (ecosystem: Ecosystem, framework: string) => {
    ecosystems.add(ecosystem);
    const label = stackLabel(ecosystem, framework);
    if (!frameworks.has(label)) frameworks.set(label, { ecosystem, framework, label });
  };

  const python = files.filter((f) => f.name.endsWith('.py'));
  const pythonHits = await runPool(python, 8, async (f) => {
    const content = await tryReadText(f.path);
    return content === null ? [] : PYTHON_FRAMEWORKS.filter((fw) => fw.re.test(content)).map((fw) => fw.name);
  });
  for (const name of pythonHits.flat()) addFramework('python', name);

  for (const manifest of files.filter((f) => f.name === 'package.json')) {
    const deps = await readPackageDependencies(manifest.path);
    if (deps === null) {
      log.debug(`Ignoring unparsable ${manifest.relativePath}`);
      continue;
    }
    const ecosystem: Ecosystem = ecosystems.has('typescript') || 'typescript' in deps ? 'typescript' : 'javascript';
    for (const fw of NODE_FRAMEWORKS) {
      if (fw.dep in deps) addFramework(ecosystem, fw.name);
    }
  }

  for (const build of files.filter((f) => f.name === 'pom.xml' || f.name.startsWith('build.gradle'))) {
    const content = await tryReadText(build.path);
    if (content && /spring-boot/.test(content)) addFramework(jvmEcosystemOf(build.name), 'spring-boot');
  }

  const out: TechStack[] = [];
  for (const ecosystem of ECOSYSTEMS) {
    if (!ecosystems.has(ecosystem)) continue;
    out.push({ ecosystem, label: ecosystem });
    const fws = [...frameworks.values()].filter((s) => s.ecosystem === ecosystem).sort((a, b) => a.label.localeCompare(b.label));
    out.push(...fws);
  }
  return out;
}

function jvmEcosystemOf(buildFile: string): Ecosystem {
  return buildFile.endsWith('.kts') ? 'kotlin' : 'java';
}

async function readPackageDependencies(path: string): Promise<Record<string, unknown> | null> {
  const raw = await tryReadText(path);
  if (raw === null) return null;
  let pkg: unknown;
  try {
    pkg = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(pkg)) return null;
  return {
    ...(isRecord(pkg.dependencies) ? pkg.dependencies : {}),
    ...(isRecord(pkg.devDependencies) ? pkg.devDependencies : {})
  };
}
