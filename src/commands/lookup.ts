/**
 * @file lookup.ts - Lookup grid command
 * @description Converts a thrust lookup grid into a long table and a 1-D throttle curve
 * @depends commander, runner, schemas, thrust-lookup-converter, logger
 */

import { Command } from 'commander';
import { LookupCliOptionsSchema } from '../core/schemas';
import { ThrustLookupConverter } from '../converters/thrust-lookup-converter';
import { Logger } from '../utils/logger';
import {
  loadProjectConfig,
  parseOptions,
  resolvePaths,
  runConversion,
  type CommandContext,
} from './runner';

export function createLookupCommand(context: CommandContext): Command {
  const command = new Command('lookup');

  command
    .description('Convert a thrust lookup grid into tidy CSVs and a throttle curve')
    .requiredOption('--input <path>', 'Path to lookup grid CSV (metadata row + N×N grid)')
    .requiredOption('--name <label>', 'Name suffix for outputs')
    .option('--outdir <path>', 'Output directory (default: data)')
    .option('--voltage <volts>', 'Voltage slice for the 1-D curve (default: middle voltage)')
    .option('--min-cmd <cmd>', 'Command mapped to 0 % throttle (default: curve minimum)')
    .option('--max-cmd <cmd>', 'Command mapped to 100 % throttle (default: curve maximum)')
    .option('--verbose', 'Print grid details')
    .action((rawOptions: unknown) => {
      const options = parseOptions(LookupCliOptionsSchema, rawOptions);
      Logger.setVerbose(options.verbose);
      const config = loadProjectConfig(context);
      const paths = resolvePaths(context, config, options);

      runConversion(`Thrust lookup ${options.name}`, () =>
        new ThrustLookupConverter().convert({
          ...paths,
          name: options.name,
          voltage: options.voltage,
          minCmd: options.minCmd,
          maxCmd: options.maxCmd,
        })
      );
    });

  return command;
}
