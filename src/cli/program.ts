/**
 * @file program.ts - Command-line program
 * @description Assembles the sub-commands and maps every failure to an exit code instead of
 * exiting, so the CLI can be driven from tests.
 * @depends commander, commands, errors, logger
 */

import { Command, CommanderError } from 'commander';
import { createEfficiencyCommand } from '../commands/efficiency';
import { createInitCommand } from '../commands/init';
import { createLookupCommand } from '../commands/lookup';
import type { CommandContext } from '../commands/runner';
import { createThrustMapCommand } from '../commands/thrustmap';
import { ExitCode, isConversionError } from '../core/errors';
import { Logger } from '../utils/logger';

export const VERSION = '0.1.0';

export function createProgram(context: CommandContext): Command {
  const program = new Command('plotdata');

  program
    .description('Convert motor test-stand and flight logs into CSV tables for pgfplots')
    .version(VERSION, '-v, --version')
    .exitOverride();

  for (const command of [
    createThrustMapCommand(context),
    createEfficiencyCommand(context),
    createLookupCommand(context),
    createInitCommand(context),
  ]) {
    command.copyInheritedSettings(program);
    program.addCommand(command);
  }

  return program;
}

/**
 * Parse `args` (without the node and script entries) and run the selected command
 * @returns Process exit code
 */
export function runCli(args: string[], context: CommandContext = { cwd: process.cwd() }): number {
  const program = createProgram(context);
  try {
    program.parse(args, { from: 'user' });
    return ExitCode.SUCCESS;
  } catch (error) {
    // Commander has already printed usage errors, help and version
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isConversionError(error)) {
      Logger.error(error.message);
      return error.exitCode;
    }
    Logger.error(error instanceof Error ? error.message : String(error));
    return ExitCode.FAILURE;
  } finally {
    Logger.setVerbose(false);
  }
}
