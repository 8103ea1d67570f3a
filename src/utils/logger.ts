/**
 * @file logger.ts - Logging utility
 * @description Provides colored console logging for the converters and the CLI.
 * Debug output is shown only with --verbose.
 * @depends chalk
 */

import chalk from 'chalk';

export class Logger {
  private static verbose = false;

  static setVerbose(enabled: boolean): void {
    Logger.verbose = enabled;
  }

  static info(message: string): void {
    console.log(chalk.blue('ℹ'), message);
  }

  static success(message: string): void {
    console.log(chalk.green('✓'), message);
  }

  static error(message: string): void {
    console.error(chalk.red('✖'), message);
  }

  static warning(message: string): void {
    console.warn(chalk.yellow('⚠'), message);
  }

  static debug(message: string): void {
    if (Logger.verbose) {
      console.log(chalk.gray('🔍'), message);
    }
  }
}
