import path from 'node:path';
import type { Command } from 'commander';

import {
  ConfigError,
  ErrorPresenter,
  loadSchemaFile,
  renderTrees,
  resolveTreeOptions,
  type ModuleSource,
} from '@yangtree/core';
import { createLogger, type LogSink, type Logger } from '@yangtree/shared';

import {
  collect,
  parseModuleSpec,
  parseTreeOptions,
  resolveLogLevel,
  type TreeCliOptions,
} from '../flags.js';
import { renderCLIView } from '../render.js';

export interface CommandIO {
  stdout: LogSink;
  stderr: LogSink;
  logger: Logger;
  colors?: boolean;
}

/**
 * Print the diagram of every requested module, or of every module in the
 * document when none is named. A module that is not found is reported and
 * skipped; the returned exit code is that of the first such failure, 0
 * otherwise. Anything else that goes wrong is thrown.
 */
export async function runTreeCommand(
  options: TreeCliOptions,
  io: CommandIO
): Promise<number> {
  if (options.schema === undefined || options.schema === '') {
    throw new ConfigError({
      message: 'Missing required option --schema <file>',
      context: { setting: '--schema' },
    });
  }

  const treeOptions = resolveTreeOptions(parseTreeOptions(options));
  const requested = (options.module ?? []).map(parseModuleSpec);
  io.logger.debug('effective options', { ...treeOptions });

  const schemaPath = path.resolve(process.cwd(), options.schema);
  const context = await loadSchemaFile(schemaPath);
  io.logger.info(`loaded ${context.modules.length} module(s)`, {
    schema: schemaPath,
  });

  const sources: ModuleSource[] =
    requested.length > 0
      ? requested
      : context.modules.map((m) => ({ name: m.name, revision: m.revision }));

  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: io.colors ?? false });
  let exitCode = 0;

  const lines = renderTrees(context, sources, treeOptions, {
    logger: io.logger,
    onNotFound: (error) => {
      io.stderr.write(renderCLIView(presenter.formatForCLI(error)) + '\n');
      if (exitCode === 0) exitCode = error.getExitCode();
    },
  });
  for (const line of lines) {
    io.stdout.write(line + '\n');
  }

  return exitCode;
}

export function registerTreeCommand(program: Command): void {
  program
    .command('tree')
    .description('Print the tree diagram of YANG modules in a schema document')
    .requiredOption('-s, --schema <file>', 'Schema document (JSON) path')
    .option(
      '-m, --module <name[@revision]>',
      'Module to print; repeatable (default: every module in the document)',
      collect,
      []
    )
    .option(
      '--tree-depth <number>',
      'Number of levels to print below each top-level node (0 = all)'
    )
    .option(
      '--tree-line-length <number>',
      'Maximum characters per line (0 = no limit)'
    )
    .option('--tree-help', 'Print the legend of tree symbols first')
    .option('--tree-prefix-module', 'Use module names instead of prefixes')
    .option(
      '--tree-prefix-main-module',
      'Prefix nodes of the printed module as well'
    )
    .option('-v, --verbose', 'Log progress to stderr')
    .option('--log-level <level>', 'debug|info|warn|error|silent')
    .action(async (options: TreeCliOptions) => {
      const logger = createLogger({ level: resolveLogLevel(options) });
      const exitCode = await runTreeCommand(options, {
        stdout: process.stdout,
        stderr: process.stderr,
        logger,
        colors: process.stderr.isTTY,
      });
      if (exitCode !== 0) {
        process.exitCode = exitCode;
      }
    });
}
