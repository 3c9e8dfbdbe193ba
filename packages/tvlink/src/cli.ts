#!/usr/bin/env node
import { logError, logEvent } from '@tvlink/core';
import { createProgram } from './program.js';

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  logError('uncaught-exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason);
  logError('unhandled-rejection', reason);
  process.exit(1);
});

/**
 * Parses the command line and runs the selected command.
 */
async function bootstrap(): Promise<void> {
  if (!process.env.TVLINK_RUN_ID) {
    process.env.TVLINK_RUN_ID = `${Date.now()}-${process.pid}`;
  }

  logEvent('info', 'cli:start', { argv: process.argv, cwd: process.cwd() });

  await createProgram().parseAsync(process.argv);
}

bootstrap().catch((error) => {
  console.error('Fatal error:', error);
  logError('main-fatal', error);
  process.exit(1);
});
