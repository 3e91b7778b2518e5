#!/usr/bin/env tsx

// CLI entry point
// - Command name: `yangtree` with the `tree` subcommand.
// - `tree` loads a schema document (--schema) and prints RFC 8340 style tree
//   diagrams for the modules named with --module, or for all of them.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  isYangTreeError,
  type YangTreeError,
} from '@yangtree/core';
import { renderCLIView } from './render.js';
import { registerTreeCommand } from './commands/tree.js';

const program = new Command();

program
  .name('yangtree')
  .description('Print tree diagrams of YANG modules')
  .version('0.1.0');

registerTreeCommand(program);

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: YangTreeError;
  if (isYangTreeError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(
      message || 'Unexpected error',
      err instanceof Error ? err : undefined
    );
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
