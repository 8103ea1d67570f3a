#!/usr/bin/env node

/**
 * @file index.ts - plotdata CLI entry point
 * @description Converters that prepare thesis plot data from motor and flight logs
 * @depends program, logger
 */

import { runCli } from './cli/program';
import { Logger } from './utils/logger';

// Global exception handling
process.on('uncaughtException', (error) => {
  Logger.error(`Uncaught exception: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const message = reason instanceof Error ? reason.message : String(reason);
  Logger.error(`Unhandled rejection: ${message}`);
  process.exit(1);
});

process.exitCode = runCli(process.argv.slice(2));
