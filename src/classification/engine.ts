import { defaultLogger, type Logger } from '../utils/logger.js';
import { extractTestFunctions } from './declarations.js';
import type { CompiledRuleSet } from './rules.js';
import { LAYERS, type Classification, type Layer, type SourceFile } from './types.js';

/**
 * Assigns files to test layers using a compiled rule set.
 *
 * Layers are matched independently, so a file may carry several. Its test
 * functions are attributed to one layer: e2e when e2e signals are present,
 * otherwise integration when integration signals are present, otherwise unit.
 */
export class ClassificationEngine {
  private log: Logger;

  constructor(
    readonly rules: CompiledRuleSet,
    opts: { logger?: Logger } = {}
  ) {
    this.log = (opts.logger ?? defaultLogger()).child('classify');
  }

  acceptsExtension(extension: string): boolean {
    return this.rules.extensions.has(extension.toLowerCase());
  }

  classify(file: SourceFile): Classification {
    const layers: Layer[] = [];
    const matchedRules: string[] = [];

    for (const layer of LAYERS) {
      let matched = false;
      for (const rule of this.rules.identity[layer]) {
        const onContent = rule.target !== 'path' && rule.regex.test(file.content);
        const onPath = rule.target !== 'content' && rule.regex.test(file.relativePath);
        if (onContent || onPath) {
          matched = true;
          matchedRules.push(`${layer}/${rule.id}`);
        }
      }
      if (matched) layers.push(layer);
    }

    const functions = extractTestFunctions(file, this.rules.declarations);
    const primaryLayer = attributeLayer(layers, functions.length);

    if (primaryLayer) {
      this.log.debug(`${file.relativePath} → ${primaryLayer}`, { layers, functions: functions.length, rules: matchedRules });
    }

    return { layers, primaryLayer, functions, matchedRules };
  }

  isTestFile(file: SourceFile): boolean {
    return this.classify(file).primaryLayer !== null;
  }
}

export function attributeLayer(layers: readonly Layer[], functionCount: number): Layer | null {
  if (layers.includes('e2e')) return 'e2e';
  if (layers.includes('integration')) return 'integration';
  if (layers.length > 0 || functionCount > 0) return 'unit';
  return null;
}
