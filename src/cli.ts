#!/usr/bin/env node
/**
 * Command-line interface for review-threads
 */

import { Command } from 'commander';
import chalk from 'chalk';
import registerBrowse from './commands/browse.js';
import { VERSION } from './version.js';

function createProgram(): Command {
  const program = new Command();
  program
    .name('review-threads')
    .description('Browse and act on pull request review threads from the terminal')
    .version(VERSION);
  registerBrowse({ program });
  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    process.exitCode = 1;
  });
