#!/usr/bin/env tsx
import './env-setup.js';

import { flushLoggers, getLogger } from '@lender-rank/logger';
import { Command } from 'commander';

import { registerExportCommand } from './features/export/export.js';
import { registerMergeCommand } from './features/merge/merge.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('lender-rank')
    .description('Tiered lender rankings and strictly-delimited monthly exports')
    .version('1.0.0');

  registerExportCommand(program);
  registerMergeCommand(program);

  await program.parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error({ reason: String(reason) }, 'Unhandled Rejection');
  flushLoggers();
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error({ error: error.message, stack: error.stack }, 'Uncaught Exception');
  flushLoggers();
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error({ error: String(error) }, 'CLI failed');
  flushLoggers();
  process.exit(1);
});
