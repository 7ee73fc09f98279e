import { resolve } from 'node:path';

import { detectStack } from '../../stack/detector.js';
import { isDirectory } from '../../utils/fs.js';
import { getRenderer } from '../ui/renderer.js';
import { cliLogger } from './logger.js';

export interface StackCommandOptions {
  path?: string;
  json?: boolean;
}

/**
 * `testlayers stack [path]`: prints the detected ecosystems and frameworks.
 */
export async function runStackCommand(opts: StackCommandOptions): Promise<{ ok: boolean; details?: unknown }> {
  const r = getRenderer();
  const root = resolve(opts.path ?? process.cwd());
  if (!(await isDirectory(root))) {
    return { ok: false, details: `Repository path does not exist or is not a directory: ${root}` };
  }

  const stacks = await detectStack(root, { logger: cliLogger() });
  if (opts.json) r.json(stacks);
  else r.stacks(root, stacks);
  return { ok: true };
}
