/**
 * Configuration options for tree rendering
 *
 * All options are optional; `resolveTreeOptions` fills in defaults and
 * rejects values the renderer cannot honour.
 */

import { ConfigError } from './errors.js';

export interface TreeOptions {
  /** Number of node levels to print below each entry point, 0 = all (default: 0) */
  depth?: number;
  /** Maximum characters per printed line, 0 = whole line (default: 0) */
  lineLength?: number;
  /** Print the legend of tree symbols before the modules (default: false) */
  help?: boolean;
  /** Display module names instead of module prefixes (default: false) */
  prefixModule?: boolean;
  /** Prefix nodes of the printed module too (default: false) */
  prefixMainModule?: boolean;
}

export type ResolvedTreeOptions = Required<TreeOptions>;

export const DEFAULT_TREE_OPTIONS: Readonly<ResolvedTreeOptions> = {
  depth: 0,
  lineLength: 0,
  help: false,
  prefixModule: false,
  prefixMainModule: false,
};

/**
 * Stand-in for "unbounded" depth and line length; large enough that no
 * schema or terminal reaches it
 */
export const UNBOUNDED = 10_000;

export function resolveTreeOptions(
  userOptions: TreeOptions = {}
): ResolvedTreeOptions {
  const resolved: ResolvedTreeOptions = {
    ...DEFAULT_TREE_OPTIONS,
    ...stripUndefined(userOptions),
  };
  validateTreeOptions(resolved);
  return resolved;
}

function stripUndefined(options: TreeOptions): TreeOptions {
  const out: TreeOptions = {};
  if (options.depth !== undefined) out.depth = options.depth;
  if (options.lineLength !== undefined) out.lineLength = options.lineLength;
  if (options.help !== undefined) out.help = options.help;
  if (options.prefixModule !== undefined)
    out.prefixModule = options.prefixModule;
  if (options.prefixMainModule !== undefined)
    out.prefixMainModule = options.prefixMainModule;
  return out;
}

function validateTreeOptions(options: ResolvedTreeOptions): void {
  for (const setting of ['depth', 'lineLength'] as const) {
    const value = options[setting];
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError({
        message: `${setting} must be a non-negative integer, got ${String(value)}`,
        context: { setting },
      });
    }
  }
}

/** Depth budget for the walker: 0 becomes the unbounded sentinel */
export function effectiveDepth(options: ResolvedTreeOptions): number {
  return options.depth === 0 ? UNBOUNDED : options.depth;
}

/** Line width for emission: 0 becomes the unbounded sentinel */
export function effectiveLineLength(options: ResolvedTreeOptions): number {
  return options.lineLength === 0 ? UNBOUNDED : options.lineLength;
}
