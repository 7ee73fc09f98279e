import chalk, { type ChalkInstance } from 'chalk';

import type { Layer } from '../../classification/types.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

const LAYER_COLORS: Record<Layer, ChalkInstance> = {
  unit: chalk.green,
  integration: chalk.yellow,
  e2e: chalk.magenta
};

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  warning: chalk.yellow,
  error: chalk.red,

  // Symbols
  cross: chalk.red('✖'),
  bullet: chalk.dim('•'),
  arrow: chalk.dim('→'),

  // Layers get a fixed color each so tables and file lists line up visually.
  layer: (layer: Layer): ChalkInstance => LAYER_COLORS[layer],

  box: {
    border: chalk.cyan,
    title: chalk.bold.cyan
  }
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 56;

/** Column width for layer names in tables. */
export const LAYER_LABEL_WIDTH = 13;
