import { resolve } from 'node:path';

import { defaultRulesPath, loadRuleSet } from '../../classification/rules.js';
import { getRenderer } from '../ui/renderer.js';

export interface RulesCommandOptions {
  rulesPath?: string;
}

/**
 * `testlayers rules`: validates a rule file and prints what it contains.
 */
export async function runRulesCommand(opts: RulesCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  try {
    const source = opts.rulesPath ? resolve(opts.rulesPath) : defaultRulesPath();
    const rules = await loadRuleSet(source);
    r.ruleSet(rules, source);
    return { ok: true };
  } catch (err) {
    return { ok: false, details: err instanceof Error ? err.message : String(err) };
  }
}
