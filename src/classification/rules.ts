import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { readYaml } from '../utils/fs.js';
import { emptyByLayer, LAYERS, type Layer } from './types.js';

export const RuleTarget = z.enum(['content', 'path', 'both']);

export const IdentityRule = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  target: RuleTarget.default('content'),
  caseSensitive: z.boolean().default(false)
});

export const DeclarationRule = z.object({
  id: z.string().min(1),
  /** Extensions (with dot) this declaration shape applies to. */
  extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/)).min(1),
  /** Must expose a `name` capture group. Matched per line-aware multiline regex. */
  pattern: z.string().min(1),
  caseSensitive: z.boolean().default(true)
});

export const RuleSetSchema = z.object({
  version: z.number().int().positive(),
  discovery: z.object({
    extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/)).min(1),
    exclude: z.array(z.string().min(1)).default([])
  }),
  layers: z.object({
    unit: z.array(IdentityRule).default([]),
    integration: z.array(IdentityRule).default([]),
    e2e: z.array(IdentityRule).default([])
  }),
  declarations: z.array(DeclarationRule).default([])
});

export type RuleSetDocument = z.infer<typeof RuleSetSchema>;
export type IdentityRuleDocument = z.infer<typeof IdentityRule>;
export type DeclarationRuleDocument = z.infer<typeof DeclarationRule>;

export interface CompiledIdentityRule {
  id: string;
  layer: Layer;
  target: z.infer<typeof RuleTarget>;
  regex: RegExp;
}

export interface CompiledDeclarationRule {
  id: string;
  extensions: ReadonlySet<string>;
  regex: RegExp;
}

export interface CompiledRuleSet {
  readonly version: number;
  readonly extensions: ReadonlySet<string>;
  readonly exclude: readonly string[];
  readonly identity: Readonly<Record<Layer, readonly CompiledIdentityRule[]>>;
  readonly declarations: readonly CompiledDeclarationRule[];
}

const DEFAULT_RULES_FILE = 'rules/default-rules.yaml';

/**
 * Validate and compile a rule-set document. Throws with every offending rule listed
 * when a pattern does not compile or a declaration lacks its `name` group.
 */
export function compileRuleSet(doc: unknown): CompiledRuleSet {
  const parsed = RuleSetSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid rule set: ${issues.join('; ')}`);
  }
  const rules = parsed.data;
  const problems: string[] = [];

  const identity = emptyByLayer<CompiledIdentityRule[]>(() => []);
  for (const layer of LAYERS) {
    for (const rule of rules.layers[layer]) {
      const regex = tryRegex(rule.pattern, rule.caseSensitive ? 'm' : 'im', problems, `${layer}/${rule.id}`);
      if (regex) identity[layer].push({ id: rule.id, layer, target: rule.target, regex });
    }
  }

  const declarations: CompiledDeclarationRule[] = [];
  for (const rule of rules.declarations) {
    const regex = tryRegex(rule.pattern, rule.caseSensitive ? 'gmd' : 'gimd', problems, `declarations/${rule.id}`);
    if (!regex) continue;
    if (!/\(\?<name>/.test(rule.pattern)) {
      problems.push(`declarations/${rule.id}: pattern has no (?<name>...) group`);
      continue;
    }
    declarations.push({ id: rule.id, extensions: new Set(rule.extensions), regex });
  }

  if (problems.length > 0) {
    throw new Error(`Invalid rule set: ${problems.join('; ')}`);
  }

  return Object.freeze({
    version: rules.version,
    extensions: new Set(rules.discovery.extensions),
    exclude: Object.freeze([...rules.discovery.exclude]),
    identity: Object.freeze(identity),
    declarations: Object.freeze(declarations)
  });
}

export async function loadRuleSet(path?: string): Promise<CompiledRuleSet> {
  const file = path ? resolve(path) : defaultRulesPath();
  let doc: unknown;
  try {
    doc = await readYaml(file);
  } catch (err) {
    throw new Error(`Could not read rule set ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return compileRuleSet(doc);
}

/**
 * Locate the bundled rules directory by walking up from this module, which works
 * both from `src/` under the test runner and from `dist/` once built.
 */
export function defaultRulesPath(): string {
  let current = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 8; i++) {
    const candidate = resolve(current, DEFAULT_RULES_FILE);
    if (existsSync(candidate)) return candidate;
    const parent = resolve(current, '..');
    if (parent === current) break;
    current = parent;
  }
  throw new Error(`Bundled ${DEFAULT_RULES_FILE} not found`);
}

function tryRegex(pattern: string, flags: string, problems: string[], label: string): RegExp | null {
  try {
    return new RegExp(pattern, flags);
  } catch (err) {
    problems.push(`${label}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}
