#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { describeError } from '../core/errors.js';
import { printBanner } from '../interactions/index.js';
import { startCommand, type StartOptions } from './commands/start.js';
import { getCurrentVersion } from './version.js';

const program = new Command();

program
  .name('tavus')
  .description('Interactive terminal client for Tavus replicas, personas, videos and conversations')
  .version(getCurrentVersion(), '-v, --version', 'Output the current version');

// ============================================================================
// Interactive Session
// ============================================================================

async function runStart(opts: StartOptions): Promise<void> {
  printBanner(getCurrentVersion());
  try {
    await startCommand(opts);
  } catch (error) {
    console.error(chalk.red('\n❌ Error:'), describeError(error));
    process.exit(1);
  }
}

program
  .command('start', { isDefault: true })
  .description('Start the interactive menu (default)')
  .option('-k, --api-key <key>', 'Tavus API key (overrides TAVUS_API_KEY and the key file)')
  .option('-f, --key-file <path>', 'File holding the API key')
  .option('--api-url <url>', 'API base URL')
  .option('--page-size <n>', 'Rows per list page')
  .option('--verbose', 'Print debug logging')
  .action(runStart);

await program.parseAsync();
