/**
 * @file thrustmap.ts - Thrust map command
 * @description Extracts throttle→thrust and rpm→thrust tables from a motor test-stand log
 * @depends commander, runner, schemas, thrust-map-extractor, logger
 */

import { Command } from 'commander';
import { ThrustMapCliOptionsSchema } from '../core/schemas';
import { ThrustMapExtractor } from '../converters/thrust-map-extractor';
import { Logger } from '../utils/logger';
import {
  loadProjectConfig,
  parseOptions,
  resolvePaths,
  runConversion,
  type CommandContext,
} from './runner';

export function createThrustMapCommand(context: CommandContext): Command {
  const command = new Command('thrustmap');

  command
    .description('Convert a test-stand log into thrust map tables')
    .requiredOption('--input <path>', 'Path to raw log CSV')
    .requiredOption('--name <label>', 'Name suffix for outputs (e.g., motorA)')
    .option('--outdir <path>', 'Output directory (default: data)')
    .option('--aggregate', 'Average rows sharing a throttle/rpm value and sort ascending')
    .option('--verbose', 'Report every rejected row')
    .action((rawOptions: unknown) => {
      const options = parseOptions(ThrustMapCliOptionsSchema, rawOptions);
      Logger.setVerbose(options.verbose);
      const config = loadProjectConfig(context);
      const paths = resolvePaths(context, config, options);

      runConversion(`Thrust map ${options.name}`, () =>
        new ThrustMapExtractor().convert({
          ...paths,
          name: options.name,
          aggregate: options.aggregate ?? config.thrustmap.aggregate,
          aliases: config.aliases,
        })
      );
    });

  return command;
}
