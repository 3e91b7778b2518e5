import {
  ConfigError,
  type ModuleSource,
  type TreeOptions,
} from '@yangtree/core';
import { isLogLevel, type LogLevel } from '@yangtree/shared';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface TreeCliOptions {
  schema?: string;
  module?: string[];
  treeDepth?: string;
  treeLineLength?: string;
  treeHelp?: boolean;
  treePrefixModule?: boolean;
  treePrefixMainModule?: boolean;
  verbose?: boolean;
  logLevel?: string;
}

const REVISION_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function parseNonNegativeInteger(flag: string, value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError({
      message: `Invalid ${flag} value "${value}". Expected a non-negative integer.`,
      context: { setting: flag },
    });
  }
  return Number(trimmed);
}

/**
 * Parse CLI options into TreeOptions; flags left out stay undefined so the
 * core defaults apply.
 */
export function parseTreeOptions(options: TreeCliOptions): TreeOptions {
  const treeOptions: TreeOptions = {};
  if (options.treeDepth !== undefined) {
    treeOptions.depth = parseNonNegativeInteger('--tree-depth', options.treeDepth);
  }
  if (options.treeLineLength !== undefined) {
    treeOptions.lineLength = parseNonNegativeInteger(
      '--tree-line-length',
      options.treeLineLength
    );
  }
  if (options.treeHelp !== undefined) {
    treeOptions.help = options.treeHelp;
  }
  if (options.treePrefixModule !== undefined) {
    treeOptions.prefixModule = options.treePrefixModule;
  }
  if (options.treePrefixMainModule !== undefined) {
    treeOptions.prefixMainModule = options.treePrefixMainModule;
  }
  return treeOptions;
}

/**
 * `name` or `name@YYYY-MM-DD`
 */
export function parseModuleSpec(spec: string): ModuleSource {
  const at = spec.indexOf('@');
  const name = (at === -1 ? spec : spec.slice(0, at)).trim();
  if (name === '') {
    throw new ConfigError({
      message: `Invalid --module value "${spec}". Expected name or name@revision.`,
      context: { setting: '--module' },
    });
  }
  if (at === -1) {
    return { name };
  }

  const revision = spec.slice(at + 1).trim();
  if (!REVISION_PATTERN.test(revision)) {
    throw new ConfigError({
      message: `Invalid revision "${revision}" in --module value "${spec}". Expected YYYY-MM-DD.`,
      context: { setting: '--module', module: name },
    });
  }
  return { name, revision };
}

/**
 * An explicit --log-level wins over --verbose.
 */
export function resolveLogLevel(
  options: Pick<TreeCliOptions, 'verbose' | 'logLevel'>
): LogLevel {
  if (options.logLevel !== undefined) {
    const level = options.logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError({
        message: `Invalid --log-level value "${options.logLevel}". Expected debug, info, warn, error or silent.`,
        context: { setting: '--log-level' },
      });
    }
    return level;
  }
  return options.verbose === true ? 'debug' : 'warn';
}

/** Commander option reducer for repeatable flags */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
