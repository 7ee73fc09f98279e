import type { Ecosystem, TechStack } from '../../stack/types.js';
import type { Toolchain } from '../types.js';
import { dotnetToolchain } from './dotnet.js';
import { goToolchain } from './go.js';
import { gradleToolchain, mavenToolchain } from './jvm.js';
import { nodeToolchain } from './node.js';
import { pythonToolchain } from './python.js';

export const TOOLCHAINS: readonly Toolchain[] = [
  pythonToolchain,
  nodeToolchain,
  mavenToolchain,
  gradleToolchain,
  goToolchain,
  dotnetToolchain
];

export interface ToolchainSelection {
  toolchains: Toolchain[];
  /** Detected ecosystems no toolchain serves. */
  unserved: Ecosystem[];
}

/** Toolchains serving the detected ecosystems, in registry order. */
export function selectToolchains(stacks: readonly TechStack[], registry: readonly Toolchain[] = TOOLCHAINS): ToolchainSelection {
  const ecosystems = [...new Set(stacks.map((s) => s.ecosystem))];
  const toolchains = registry.filter((t) => t.ecosystems.some((e) => ecosystems.includes(e)));
  const unserved = ecosystems.filter((e) => !registry.some((t) => t.ecosystems.includes(e)));
  return { toolchains, unserved };
}
